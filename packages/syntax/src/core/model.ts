/**
 * Core domain types for the syntax package.
 *
 * A parsed file is an immutable tree of elements. The element union is closed:
 * consumers switch on `kind` and get exhaustiveness checks from the compiler.
 */

export interface Location {
  /** 1-indexed line number */
  line: number;
  /** 1-indexed column number */
  column: number;
  /** 0-indexed character offset from start of file */
  offset: number;
}

export interface Span {
  start: Location;
  end: Location;
}

export type Visibility = "public" | "private" | "protected";

export type DefinitionKeyword =
  | "part"
  | "attribute"
  | "item"
  | "port"
  | "action"
  | "state"
  | "requirement"
  | "constraint"
  | "connection"
  | "interface"
  | "allocation"
  | "view"
  | "viewpoint"
  | "rendering"
  | "enum"
  | "occurrence"
  | "calc"
  | "case"
  | "use case"
  | "analysis case"
  | "verification case"
  | "concern"
  | "flow"
  | "metadata";

export type UsageKeyword =
  | DefinitionKeyword
  | "ref"
  | "subject"
  | "actor"
  | "stakeholder"
  | "objective"
  | "snapshot"
  | "timeslice"
  | "event"
  | "satisfy"
  | "perform"
  | "exhibit"
  | "include";

export type ClassifierKeyword =
  | "type"
  | "classifier"
  | "class"
  | "datatype"
  | "struct"
  | "assoc"
  | "behavior"
  | "function"
  | "predicate"
  | "interaction"
  | "metaclass";

export type Prefix =
  | "abstract"
  | "variation"
  | "in"
  | "out"
  | "inout"
  | "ref"
  | "readonly"
  | "derived"
  | "end"
  | "individual";

export type RelationKind =
  | "specialization"      // A :> B on a definition or classifier
  | "typing"              // a : T
  | "subsetting"          // a :> b on a usage or feature
  | "redefinition"        // a :>> b
  | "referenceSubsetting" // a ::> b
  | "satisfaction"        // satisfy R
  | "performance"         // perform A
  | "exhibition"          // exhibit S
  | "inclusion";          // include U

export type ImportKind = "member" | "namespace" | "recursive";

export interface Identifier {
  text: string;
  span: Span;
}

/**
 * A name written as a reference, e.g. `Shell::edges::vertices`.
 * References never declare anything.
 */
export interface QualifiedReference {
  text: string;
  segments: string[];
  span: Span;
}

export interface RelationshipPart {
  kind: "relationship";
  relation: RelationKind;
  target: QualifiedReference;
  span: Span;
}

/** Opaque expression text after `=`, `:=` or `default`. */
export interface ValueNode {
  kind: "value";
  text: string;
  span: Span;
}

export interface PackageNode {
  kind: "package";
  name: Identifier | null;
  visibility: Visibility;
  isLibrary: boolean;
  isStandard: boolean;
  members: SyntaxElement[];
  span: Span;
}

export interface DefinitionNode {
  kind: "definition";
  keyword: DefinitionKeyword;
  name: Identifier | null;
  visibility: Visibility;
  prefixes: Prefix[];
  relationships: RelationshipPart[];
  value: ValueNode | null;
  members: SyntaxElement[];
  span: Span;
}

export interface UsageNode {
  kind: "usage";
  keyword: UsageKeyword;
  name: Identifier | null;
  visibility: Visibility;
  prefixes: Prefix[];
  relationships: RelationshipPart[];
  value: ValueNode | null;
  members: SyntaxElement[];
  span: Span;
}

export interface ClassifierNode {
  kind: "classifier";
  keyword: ClassifierKeyword;
  name: Identifier | null;
  visibility: Visibility;
  prefixes: Prefix[];
  relationships: RelationshipPart[];
  members: SyntaxElement[];
  span: Span;
}

export interface FeatureNode {
  kind: "feature";
  name: Identifier | null;
  visibility: Visibility;
  prefixes: Prefix[];
  relationships: RelationshipPart[];
  value: ValueNode | null;
  members: SyntaxElement[];
  span: Span;
}

export interface AliasNode {
  kind: "alias";
  name: Identifier;
  visibility: Visibility;
  target: QualifiedReference;
  span: Span;
}

export interface ImportNode {
  kind: "import";
  importKind: ImportKind;
  target: QualifiedReference;
  alias: Identifier | null;
  visibility: Visibility;
  isAll: boolean;
  span: Span;
}

export interface CommentNode {
  kind: "comment";
  isDoc: boolean;
  text: string;
  span: Span;
}

export type SyntaxElement =
  | PackageNode
  | DefinitionNode
  | UsageNode
  | ClassifierNode
  | FeatureNode
  | AliasNode
  | ImportNode
  | CommentNode;

export type ElementKind = SyntaxElement["kind"];

/**
 * Parsed representation of one source file.
 */
export interface SyntaxFile {
  path: string;
  language: LanguageId;
  members: SyntaxElement[];
}

export interface ParseError {
  message: string;
  span: Span;
}

export type LanguageId = "sysml" | "kerml";

export interface Language {
  id: LanguageId;
  name: string;
  extensions: string[];
}

export const LANGUAGES: Record<LanguageId, Language> = {
  sysml: {
    id: "sysml",
    name: "SysML v2",
    extensions: [".sysml"],
  },
  kerml: {
    id: "kerml",
    name: "KerML",
    extensions: [".kerml"],
  },
};

/**
 * Detect language from file path extension.
 */
export function detectLanguage(filePath: string): Language | undefined {
  const ext = filePath.slice(filePath.lastIndexOf(".")).toLowerCase();
  for (const lang of Object.values(LANGUAGES)) {
    if (lang.extensions.includes(ext)) {
      return lang;
    }
  }
  return undefined;
}
