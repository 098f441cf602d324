import { Err, Ok, type Result } from "@syslens/core";

import {
  detectLanguage,
  type ClassifierKeyword,
  type CommentNode,
  type DefinitionKeyword,
  type Identifier,
  type ImportKind,
  type ImportNode,
  type Language,
  type PackageNode,
  type ParseError,
  type Prefix,
  type QualifiedReference,
  type RelationKind,
  type RelationshipPart,
  type Span,
  type SyntaxElement,
  type SyntaxFile,
  type UsageKeyword,
  type UsageNode,
  type ValueNode,
  type Visibility,
} from "../../core/model.js";
import type { SyntaxParser } from "../../core/ports/Parser.js";
import { joinSpans } from "../../core/tree.js";
import { tokenize, type Token } from "./Lexer.js";

const DEFINITION_KEYWORDS: ReadonlySet<string> = new Set<DefinitionKeyword>([
  "part",
  "attribute",
  "item",
  "port",
  "action",
  "state",
  "requirement",
  "constraint",
  "connection",
  "interface",
  "allocation",
  "view",
  "viewpoint",
  "rendering",
  "enum",
  "occurrence",
  "calc",
  "case",
  "concern",
  "flow",
  "metadata",
]);

const MULTI_WORD_KEYWORDS: ReadonlyMap<string, DefinitionKeyword> = new Map<string, DefinitionKeyword>([
  ["use", "use case"],
  ["analysis", "analysis case"],
  ["verification", "verification case"],
]);

const USAGE_ONLY_KEYWORDS: ReadonlySet<string> = new Set<UsageKeyword>([
  "ref",
  "subject",
  "actor",
  "stakeholder",
  "objective",
  "snapshot",
  "timeslice",
  "event",
]);

interface RelationshipUsage {
  keyword: UsageKeyword;
  relation: RelationKind;
}

const RELATIONSHIP_USAGES: ReadonlyMap<string, RelationshipUsage> = new Map<string, RelationshipUsage>([
  ["satisfy", { keyword: "satisfy", relation: "satisfaction" }],
  ["perform", { keyword: "perform", relation: "performance" }],
  ["exhibit", { keyword: "exhibit", relation: "exhibition" }],
  ["include", { keyword: "include", relation: "inclusion" }],
]);

const CLASSIFIER_KEYWORDS: ReadonlySet<string> = new Set<ClassifierKeyword>([
  "type",
  "classifier",
  "class",
  "datatype",
  "struct",
  "assoc",
  "behavior",
  "function",
  "predicate",
  "interaction",
  "metaclass",
]);

const PREFIXES: ReadonlySet<string> = new Set<Prefix>([
  "abstract",
  "variation",
  "in",
  "out",
  "inout",
  "ref",
  "readonly",
  "derived",
  "end",
  "individual",
]);

// Words that can never be an unquoted element name.
const RESERVED: ReadonlySet<string> = new Set([
  ...DEFINITION_KEYWORDS,
  ...USAGE_ONLY_KEYWORDS,
  ...RELATIONSHIP_USAGES.keys(),
  ...CLASSIFIER_KEYWORDS,
  ...PREFIXES,
  "def", "feature", "package", "library", "standard", "import", "alias", "for", "as", "all",
  "doc", "comment", "about", "locale", "public", "private", "protected",
  "specializes", "subsets", "redefines", "references", "typed", "defined", "by",
  "default", "ordered", "nonunique", "conjugates",
  "entry", "exit", "do", "then", "first", "accept", "send", "via", "to", "from", "of",
  "if", "else", "while", "until", "loop", "bind", "connect", "transition", "succession",
  "message", "allocate", "assert", "assume", "require", "frame", "verify", "expose",
  "render", "filter", "dependency", "return", "language", "rep", "new", "meta",
  "true", "false", "null", "not", "and", "or", "xor", "implies", "hastype", "istype",
]);

// Symbols that may follow the name of a keyword-less reference usage.
const DEFAULT_REFERENCE_FOLLOW: ReadonlySet<string> = new Set([
  ":", ":>", ":>>", "::>", ";", "[", "=", ":=", "{",
]);

const RELATION_WORDS: ReadonlySet<string> = new Set([
  "specializes", "subsets", "redefines", "references", "typed", "defined", "default",
]);

function isDefinitionKeyword(word: string): word is DefinitionKeyword {
  return DEFINITION_KEYWORDS.has(word) || [...MULTI_WORD_KEYWORDS.values()].some((k) => k === word);
}

function isUsageOnlyKeyword(word: string): word is UsageKeyword {
  return USAGE_ONLY_KEYWORDS.has(word);
}

function isClassifierKeyword(word: string): word is ClassifierKeyword {
  return CLASSIFIER_KEYWORDS.has(word);
}

function isPrefix(word: string): word is Prefix {
  return PREFIXES.has(word);
}

function isVisibility(word: string | undefined): word is Visibility {
  return word === "public" || word === "private" || word === "protected";
}

class ParseFailure extends Error {
  constructor(readonly detail: ParseError) {
    super(detail.message);
  }
}

/**
 * Recursive-descent parser over the significant tokens of one file.
 * Statements it does not model are skipped and declare nothing.
 */
class ElementParser {
  private readonly tokens: Token[];
  private readonly comments: Token[];
  private pos = 0;

  constructor(
    private readonly source: string,
    tokens: Token[]
  ) {
    this.tokens = tokens.filter((t) => t.kind !== "comment");
    this.comments = tokens.filter((t) => t.kind === "comment");
  }

  parseFile(): SyntaxElement[] {
    const members = this.parseMembers();
    if (this.atSymbol("}")) {
      this.fail("Unexpected '}'");
    }
    return members;
  }

  private parseMembers(): SyntaxElement[] {
    const members: SyntaxElement[] = [];
    while (!this.atSymbol("}") && this.peek().kind !== "eof") {
      const member = this.parseMember();
      if (member) members.push(member);
    }
    return members;
  }

  private parseMember(): SyntaxElement | null {
    const start = this.peek();
    const visibility = this.parseVisibility();

    switch (this.keywordAt(0)) {
      case "package":
        return this.parsePackage(start, visibility, false, false);
      case "library":
        if (this.keywordAt(1) === "package") {
          this.next();
          return this.parsePackage(start, visibility, true, false);
        }
        break;
      case "standard":
        if (this.keywordAt(1) === "library" && this.keywordAt(2) === "package") {
          this.next();
          this.next();
          return this.parsePackage(start, visibility, true, true);
        }
        break;
      case "import":
        return this.parseImport(start, visibility);
      case "alias":
        return this.parseAlias(start, visibility);
      case "doc":
      case "comment":
        return this.parseComment(start);
      case "assert":
        if (this.keywordAt(1) === "satisfy") {
          this.next();
          return this.parseRelationshipUsage(start, visibility);
        }
        break;
      case "satisfy":
      case "perform":
      case "exhibit":
      case "include":
        return this.parseRelationshipUsage(start, visibility);
    }

    const element = this.parseFeatureLike(start, visibility);
    if (element) return element;

    this.skipStatement();
    return null;
  }

  private parsePackage(
    start: Token,
    visibility: Visibility,
    isLibrary: boolean,
    isStandard: boolean
  ): PackageNode {
    this.expectKeyword("package");
    const name = this.parseName();
    const members = this.parseBody();
    return { kind: "package", name, visibility, isLibrary, isStandard, members, span: this.spanFrom(start) };
  }

  private parseImport(start: Token, visibility: Visibility): ImportNode {
    this.expectKeyword("import");
    let isAll = false;
    if (this.keywordAt(0) === "all") {
      this.next();
      isAll = true;
    }

    const first = this.expectName();
    const segments = [first.value];
    let targetEnd = first.span;
    let importKind: ImportKind = "member";

    while (this.atSymbol("::")) {
      const after = this.peek(1);
      if (after.kind === "symbol" && after.text === "*") {
        this.next();
        this.next();
        importKind = "namespace";
        if (this.atSymbol("::") && this.peek(1).text === "**") {
          this.next();
          this.next();
          importKind = "recursive";
        }
        break;
      }
      if (after.kind === "symbol" && after.text === "**") {
        this.next();
        this.next();
        importKind = "recursive";
        break;
      }
      if (after.kind !== "name") {
        this.fail("Expected a name or wildcard after '::'", after.span);
      }
      this.next();
      const segment = this.next();
      segments.push(segment.value);
      targetEnd = segment.span;
    }

    let alias: Identifier | null = null;
    if (this.keywordAt(0) === "as") {
      this.next();
      const token = this.expectName();
      alias = { text: token.value, span: token.span };
    }
    if (this.atSymbol("[")) {
      this.skipBalanced("[", "]");
    }
    this.parseBody();

    const target: QualifiedReference = {
      text: segments.join("::"),
      segments,
      span: joinSpans(first.span, targetEnd),
    };
    return { kind: "import", importKind, target, alias, visibility, isAll, span: this.spanFrom(start) };
  }

  private parseAlias(start: Token, visibility: Visibility): SyntaxElement {
    this.expectKeyword("alias");
    const name = this.parseName();
    if (!name) {
      this.fail("Expected alias name");
    }
    this.expectKeyword("for");
    const target = this.parseQualifiedReference();
    this.parseBody();
    return { kind: "alias", name, visibility, target, span: this.spanFrom(start) };
  }

  private parseComment(start: Token): CommentNode {
    const isDoc = this.next().value === "doc";
    if (!isDoc) {
      this.parseName();
      if (this.keywordAt(0) === "about") {
        this.next();
        do {
          this.parseQualifiedReference();
        } while (this.acceptSymbol(","));
      }
    }
    if (this.keywordAt(0) === "locale") {
      this.next();
      this.next();
    }

    const after = this.previous().span.end.offset;
    const before = this.peek().span.start.offset;
    const body = this.comments.find(
      (c) => c.span.start.offset >= after && c.span.start.offset < before && c.text.startsWith("/*")
    );
    if (!body) {
      this.fail("Expected a /* comment body */");
    }
    return { kind: "comment", isDoc, text: body.value, span: joinSpans(start.span, body.span) };
  }

  private parseRelationshipUsage(start: Token, visibility: Visibility): UsageNode {
    const word = this.next().value;
    const usage = RELATIONSHIP_USAGES.get(word);
    if (!usage) {
      this.fail(`Unknown relationship usage '${word}'`);
    }
    this.parseSysmlKeyword();

    const targetStart = this.peek();
    const target = this.parseQualifiedReference();
    this.skipFeatureChain();
    const relationships: RelationshipPart[] = [
      { kind: "relationship", relation: usage.relation, target, span: this.spanFrom(targetStart) },
    ];

    if (this.keywordAt(0) === "by") {
      this.next();
      this.parseQualifiedReference();
      this.skipFeatureChain();
    }
    const members = this.parseBody();

    return {
      kind: "usage",
      keyword: usage.keyword,
      name: null,
      visibility,
      prefixes: [],
      relationships,
      value: null,
      members,
      span: this.spanFrom(start),
    };
  }

  private parseFeatureLike(start: Token, visibility: Visibility): SyntaxElement | null {
    const mark = this.pos;
    const prefixes: Prefix[] = [];

    while (true) {
      if (this.atSymbol("#")) {
        this.next();
        this.parseQualifiedReference();
        continue;
      }
      const word = this.keywordAt(0);
      if (word === undefined || !isPrefix(word)) break;
      if (word === "ref" && !this.startsTypedKeyword(1)) break;
      prefixes.push(word);
      this.next();
    }

    const word = this.keywordAt(0);
    if (word === "feature") {
      this.next();
      const name = this.parseName();
      const relationships = this.parseRelationships(false);
      const value = this.parseValue();
      const members = this.parseBody();
      return { kind: "feature", name, visibility, prefixes, relationships, value, members, span: this.spanFrom(start) };
    }

    if (word !== undefined && isClassifierKeyword(word)) {
      this.next();
      if (word === "assoc" && this.keywordAt(0) === "struct") {
        this.next();
      }
      const name = this.parseName();
      const relationships = this.parseRelationships(true);
      const members = this.parseBody();
      return {
        kind: "classifier",
        keyword: word,
        name,
        visibility,
        prefixes,
        relationships,
        members,
        span: this.spanFrom(start),
      };
    }

    const keyword = this.parseSysmlKeyword();
    if (keyword !== undefined && this.keywordAt(0) === "def") {
      if (!isDefinitionKeyword(keyword)) {
        this.fail(`'${keyword}' cannot start a definition`);
      }
      this.next();
      const name = this.parseName();
      const relationships = this.parseRelationships(true);
      const value = this.parseValue();
      const members = this.parseBody();
      return {
        kind: "definition",
        keyword,
        name,
        visibility,
        prefixes,
        relationships,
        value,
        members,
        span: this.spanFrom(start),
      };
    }

    if (keyword !== undefined || prefixes.length > 0 || this.startsDefaultReference()) {
      const name = this.parseName();
      const relationships = this.parseRelationships(false);
      const value = this.parseValue();
      const members = this.parseBody();
      return {
        kind: "usage",
        keyword: keyword ?? "ref",
        name,
        visibility,
        prefixes,
        relationships,
        value,
        members,
        span: this.spanFrom(start),
      };
    }

    this.pos = mark;
    return null;
  }

  private parseSysmlKeyword(): DefinitionKeyword | UsageKeyword | undefined {
    const word = this.keywordAt(0);
    if (word === undefined) return undefined;

    const multi = MULTI_WORD_KEYWORDS.get(word);
    if (multi && this.keywordAt(1) === "case") {
      this.next();
      this.next();
      return multi;
    }
    if (DEFINITION_KEYWORDS.has(word) && isDefinitionKeyword(word)) {
      this.next();
      return word;
    }
    if (isUsageOnlyKeyword(word)) {
      this.next();
      return word;
    }
    return undefined;
  }

  private startsTypedKeyword(ahead: number): boolean {
    const word = this.keywordAt(ahead);
    if (word === undefined) return false;
    if (MULTI_WORD_KEYWORDS.has(word)) return this.keywordAt(ahead + 1) === "case";
    return DEFINITION_KEYWORDS.has(word) || USAGE_ONLY_KEYWORDS.has(word) || CLASSIFIER_KEYWORDS.has(word) || word === "feature";
  }

  private startsDefaultReference(): boolean {
    const token = this.peek();
    if (token.kind === "symbol") {
      return token.text === ":>>" || token.text === "::>";
    }
    if (token.kind !== "name" || (!token.quoted && RESERVED.has(token.value))) {
      return false;
    }
    const after = this.peek(1);
    if (after.kind === "symbol") {
      return DEFAULT_REFERENCE_FOLLOW.has(after.text);
    }
    return after.kind === "name" && !after.quoted && RELATION_WORDS.has(after.value);
  }

  private parseName(): Identifier | null {
    if (this.atSymbol("<")) {
      this.next();
      this.expectName();
      this.expectSymbol(">");
    }
    const token = this.peek();
    if (token.kind === "name" && (token.quoted || !RESERVED.has(token.value))) {
      this.next();
      return { text: token.value, span: token.span };
    }
    return null;
  }

  private parseRelationships(isType: boolean): RelationshipPart[] {
    const parts: RelationshipPart[] = [];

    while (true) {
      if (this.atSymbol("[")) {
        this.skipBalanced("[", "]");
        continue;
      }
      const word = this.keywordAt(0);
      if (word === "ordered" || word === "nonunique") {
        this.next();
        continue;
      }

      const relation = this.parseRelationOperator(isType);
      if (!relation) break;

      do {
        const start = this.peek();
        this.acceptSymbol("~");
        const target = this.parseQualifiedReference();
        this.skipFeatureChain();
        parts.push({ kind: "relationship", relation, target, span: this.spanFrom(start) });
      } while (this.acceptSymbol(","));
    }

    return parts;
  }

  private parseRelationOperator(isType: boolean): RelationKind | undefined {
    const token = this.peek();
    if (token.kind === "symbol") {
      const relation: RelationKind | undefined =
        token.text === ":>" ? (isType ? "specialization" : "subsetting")
        : token.text === ":" ? "typing"
        : token.text === ":>>" ? "redefinition"
        : token.text === "::>" ? "referenceSubsetting"
        : undefined;
      if (relation) this.next();
      return relation;
    }

    switch (this.keywordAt(0)) {
      case "specializes":
        this.next();
        return "specialization";
      case "subsets":
        this.next();
        return "subsetting";
      case "redefines":
        this.next();
        return "redefinition";
      case "references":
        this.next();
        return "referenceSubsetting";
      case "typed":
      case "defined":
        if (this.keywordAt(1) === "by") {
          this.next();
          this.next();
          return "typing";
        }
        return undefined;
      default:
        return undefined;
    }
  }

  private parseQualifiedReference(): QualifiedReference {
    const first = this.expectName();
    const segments = [first.value];
    let end = first.span;

    while (this.atSymbol("::") && this.peek(1).kind === "name") {
      this.next();
      const segment = this.next();
      segments.push(segment.value);
      end = segment.span;
    }

    return { text: segments.join("::"), segments, span: joinSpans(first.span, end) };
  }

  // Feature chains (`engine.cylinders`) are navigation, not names to resolve.
  private skipFeatureChain(): void {
    while (this.atSymbol(".") && this.peek(1).kind === "name") {
      this.next();
      this.next();
    }
  }

  private parseValue(): ValueNode | null {
    const start = this.peek();
    if (this.keywordAt(0) === "default") {
      this.next();
      if (!this.acceptSymbol("=")) this.acceptSymbol(":=");
    } else if (!this.acceptSymbol("=") && !this.acceptSymbol(":=")) {
      return null;
    }

    const exprStart = this.peek();
    let depth = 0;
    while (this.peek().kind !== "eof") {
      const token = this.peek();
      if (token.kind === "symbol") {
        if (token.text === "(" || token.text === "[") depth++;
        else if ((token.text === ")" || token.text === "]") && depth > 0) depth--;
        else if (depth === 0 && (token.text === ";" || token.text === "{" || token.text === "}")) break;
      }
      this.next();
    }

    const span: Span = { start: start.span.start, end: this.previous().span.end };
    const text = this.source.slice(exprStart.span.start.offset, this.previous().span.end.offset).trim();
    return { kind: "value", text, span };
  }

  private parseBody(): SyntaxElement[] {
    this.skipToBody();
    if (this.acceptSymbol(";")) return [];
    this.expectSymbol("{");
    const members = this.parseMembers();
    this.expectSymbol("}");
    return members;
  }

  // Tolerates trailing clauses this parser does not model (`connect a to b`).
  private skipToBody(): void {
    let depth = 0;
    while (this.peek().kind !== "eof") {
      const token = this.peek();
      if (token.kind === "symbol") {
        if (depth === 0 && (token.text === ";" || token.text === "{" || token.text === "}")) return;
        if (token.text === "(" || token.text === "[") depth++;
        else if ((token.text === ")" || token.text === "]") && depth > 0) depth--;
      }
      this.next();
    }
  }

  private skipStatement(): void {
    let depth = 0;
    while (this.peek().kind !== "eof") {
      const token = this.peek();
      if (token.kind === "symbol") {
        if (token.text === "(" || token.text === "[") {
          depth++;
        } else if ((token.text === ")" || token.text === "]") && depth > 0) {
          depth--;
        } else if (depth === 0 && token.text === ";") {
          this.next();
          return;
        } else if (depth === 0 && token.text === "}") {
          return;
        } else if (depth === 0 && token.text === "{") {
          this.skipBalanced("{", "}");
          return;
        }
      }
      this.next();
    }
  }

  private skipBalanced(open: string, close: string): void {
    const start = this.peek();
    this.expectSymbol(open);
    let depth = 1;
    while (depth > 0) {
      const token = this.next();
      if (token.kind === "eof") {
        this.fail(`Unbalanced '${open}'`, start.span);
      }
      if (token.kind !== "symbol") continue;
      if (token.text === open) depth++;
      else if (token.text === close) depth--;
    }
  }

  private parseVisibility(): Visibility {
    const word = this.keywordAt(0);
    if (isVisibility(word)) {
      this.next();
      return word;
    }
    return "public";
  }

  private keywordAt(ahead: number): string | undefined {
    const token = this.peek(ahead);
    return token.kind === "name" && !token.quoted ? token.value : undefined;
  }

  private atSymbol(text: string): boolean {
    const token = this.peek();
    return token.kind === "symbol" && token.text === text;
  }

  private acceptSymbol(text: string): boolean {
    if (!this.atSymbol(text)) return false;
    this.next();
    return true;
  }

  private expectSymbol(text: string): void {
    if (!this.acceptSymbol(text)) {
      this.fail(`Expected '${text}' but found ${describe(this.peek())}`);
    }
  }

  private expectKeyword(word: string): void {
    if (this.keywordAt(0) !== word) {
      this.fail(`Expected '${word}' but found ${describe(this.peek())}`);
    }
    this.next();
  }

  private expectName(): Token {
    const token = this.peek();
    if (token.kind !== "name") {
      this.fail(`Expected a name but found ${describe(token)}`);
    }
    return this.next();
  }

  private peek(ahead = 0): Token {
    return this.tokens[Math.min(this.pos + ahead, this.tokens.length - 1)];
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== "eof") this.pos++;
    return token;
  }

  private previous(): Token {
    return this.tokens[Math.max(this.pos - 1, 0)];
  }

  private spanFrom(start: Token): Span {
    return { start: start.span.start, end: this.previous().span.end };
  }

  private fail(message: string, span: Span = this.peek().span): never {
    throw new ParseFailure({ message, span });
  }
}

function describe(token: Token): string {
  return token.kind === "eof" ? "end of file" : `'${token.text}'`;
}

/**
 * Parser for the textual SysML v2 / KerML subset used by model files.
 */
export class SysmlParser implements SyntaxParser {
  parse(source: string, filePath: string): Result<SyntaxFile, ParseError[]> {
    const language = detectLanguage(filePath)?.id ?? "sysml";

    const lexed = tokenize(source);
    if (!lexed.ok) {
      return Err([lexed.error]);
    }

    try {
      const members = new ElementParser(source, lexed.value).parseFile();
      return Ok({ path: filePath, language, members });
    } catch (error) {
      if (error instanceof ParseFailure) {
        return Err([error.detail]);
      }
      throw error;
    }
  }

  detectLanguage(filePath: string): Language | undefined {
    return detectLanguage(filePath);
  }
}
