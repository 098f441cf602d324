import { describe, it, expect } from "vitest";
import { textResponse, errorResponse, successResponse, resultToResponse } from "../src/mcp.js";
import { Ok, Err, type Result } from "../src/result.js";

describe("MCP utilities", () => {
  describe("textResponse", () => {
    it("creates a text-only response", () => {
      expect(textResponse("Hello")).toEqual({
        content: [{ type: "text", text: "Hello" }],
      });
    });
  });

  describe("errorResponse", () => {
    it("prefixes the message and flags the error", () => {
      expect(errorResponse("Something went wrong")).toEqual({
        content: [{ type: "text", text: "Error: Something went wrong" }],
        structuredContent: { success: false, error: "Something went wrong" },
        isError: true,
      });
    });
  });

  describe("successResponse", () => {
    it("merges data with success: true", () => {
      expect(successResponse("Loaded 3 files", { files: 3 })).toEqual({
        content: [{ type: "text", text: "Loaded 3 files" }],
        structuredContent: { files: 3, success: true },
      });
    });
  });

  describe("resultToResponse", () => {
    it("formats success values", () => {
      const result: Result<number, string> = Ok(5);
      const response = resultToResponse(result, (n) => textResponse(`n=${n}`));
      expect(response.content[0].text).toBe("n=5");
    });

    it("uses the error message of Error values", () => {
      const result: Result<number, Error> = Err(new Error("disk full"));
      const response = resultToResponse(result, (n) => textResponse(`n=${n}`));
      expect(response.content[0].text).toBe("Error: disk full");
      expect(response.isError).toBe(true);
    });

    it("uses string errors as the message", () => {
      const result: Result<number, string> = Err("missing");
      const response = resultToResponse(result, (n) => textResponse(`n=${n}`));
      expect(response.content[0].text).toBe("Error: missing");
    });
  });
});
