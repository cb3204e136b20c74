export interface SourceSpan {
  start: number;
  end: number;
  line: number;
  column: number;
}

export type NodeId = number;

interface NodeBase {
  span: SourceSpan;
  id: NodeId;
}

export type Literal =
  | ({ kind: "int" } & NodeBase & { value: number })
  | ({ kind: "float" } & NodeBase & { value: number })
  | ({ kind: "bool" } & NodeBase & { value: boolean })
  | ({ kind: "string" } & NodeBase & { value: string })
  | ({ kind: "unit" } & NodeBase);

export interface StructPatternField extends NodeBase {
  kind: "struct_pattern_field";
  name: string;
  pattern: Pattern;
}

export type Pattern =
  | ({ kind: "wildcard" } & NodeBase)
  | ({ kind: "variable" } & NodeBase & { name: string })
  | ({ kind: "literal" } & NodeBase & { literal: Literal })
  | ({ kind: "struct" } & NodeBase & { name: string; fields: StructPatternField[] })
  | ({ kind: "array" } & NodeBase & { elements: Pattern[]; rest?: Pattern });

export interface Parameter extends NodeBase {
  kind: "parameter";
  name: string;
  annotation?: TypeExpr;
}

export type Expr =
  | IdentifierExpr
  | LiteralExpr
  | BinaryExpr
  | UnaryExpr
  | CallExpr
  | IndexExpr
  | FieldAccessExpr
  | LambdaExpr
  | LetInExpr
  | BlockExpr
  | IfExpr
  | MatchExpr
  | StructLiteralExpr
  | ArrayExpr
  | MatrixExpr
  | ComprehensionExpr
  | RangeExpr
  | AssignExpr
  | ParallelExpr
  | SpawnExpr
  | WaitExpr;

export interface IdentifierExpr extends NodeBase {
  kind: "identifier";
  name: string;
}

export interface LiteralExpr extends NodeBase {
  kind: "literal";
  literal: Literal;
}

export interface BinaryExpr extends NodeBase {
  kind: "binary";
  operator: string;
  left: Expr;
  right: Expr;
}

export interface UnaryExpr extends NodeBase {
  kind: "unary";
  operator: string;
  operand: Expr;
}

export interface CallExpr extends NodeBase {
  kind: "call";
  callee: Expr;
  arguments: Expr[];
}

export interface IndexExpr extends NodeBase {
  kind: "index";
  target: Expr;
  index: Expr;
}

export interface FieldAccessExpr extends NodeBase {
  kind: "field_access";
  target: Expr;
  field: string;
}

export interface LambdaExpr extends NodeBase {
  kind: "lambda";
  parameters: Parameter[];
  returnAnnotation?: TypeExpr;
  body: Expr;
}

export interface LetInExpr extends NodeBase {
  kind: "let_in";
  declaration: LetDeclaration;
  body: Expr;
}

export interface BlockExpr extends NodeBase {
  kind: "block";
  statements: BlockStatement[];
  result?: Expr;
}

export interface IfExpr extends NodeBase {
  kind: "if";
  condition: Expr;
  thenBranch: Expr;
  elseBranch?: Expr;
}

export interface MatchArm extends NodeBase {
  kind: "match_arm";
  pattern: Pattern;
  guard?: Expr;
  body: Expr;
}

export interface MatchExpr extends NodeBase {
  kind: "match";
  scrutinee: Expr;
  arms: MatchArm[];
}

export interface StructFieldInit extends NodeBase {
  kind: "struct_field_init";
  name: string;
  value: Expr;
}

export interface StructLiteralExpr extends NodeBase {
  kind: "struct_literal";
  name: string;
  fields: StructFieldInit[];
}

export interface ArrayExpr extends NodeBase {
  kind: "array";
  elements: Expr[];
}

/** `[[1, 2], [3, 4]]`: every element is a bracketed row of the same length. */
export interface MatrixExpr extends NodeBase {
  kind: "matrix";
  rows: Expr[][];
}

export interface ComprehensionGenerator extends NodeBase {
  kind: "generator";
  variable: string;
  iterable: Expr;
}

export interface ComprehensionExpr extends NodeBase {
  kind: "comprehension";
  body: Expr;
  generators: ComprehensionGenerator[];
  filters: Expr[];
}

export interface RangeExpr extends NodeBase {
  kind: "range";
  start: Expr;
  end: Expr;
  inclusive: boolean;
}

export interface AssignExpr extends NodeBase {
  kind: "assign";
  name: string;
  value: Expr;
}

export interface ParallelExpr extends NodeBase {
  kind: "parallel";
  statements: BlockStatement[];
}

export interface SpawnExpr extends NodeBase {
  kind: "spawn";
  body: Expr;
}

export interface WaitExpr extends NodeBase {
  kind: "wait";
  target: Expr;
}

export type BlockStatement = LetStatement | ExprStatement;

export interface LetStatement extends NodeBase {
  kind: "let_statement";
  declaration: LetDeclaration;
}

export interface ExprStatement extends NodeBase {
  kind: "expr_statement";
  expression: Expr;
}

export type TypeExpr =
  | TypeVariable
  | TypeFunction
  | TypeReference
  | TypeArray;

export interface TypeVariable extends NodeBase {
  kind: "type_var";
  name: string;
}

export interface TypeFunction extends NodeBase {
  kind: "type_fn";
  parameters: TypeExpr[];
  result: TypeExpr;
}

/** `Int`, `Matrix<Float>`, `Handle<T>`, a struct name. */
export interface TypeReference extends NodeBase {
  kind: "type_ref";
  name: string;
  typeArgs: TypeExpr[];
}

export interface TypeArray extends NodeBase {
  kind: "type_array";
  element: TypeExpr;
}

export interface LetDeclaration extends NodeBase {
  kind: "let";
  name: string;
  nameSpan: SourceSpan;
  mutable: boolean;
  annotation?: TypeExpr;
  value: Expr;
  // True when the value is a lambda, which may refer to itself
  isRecursive: boolean;
  attributes: string[];
}

export interface StructFieldDecl extends NodeBase {
  kind: "struct_field";
  name: string;
  type: TypeExpr;
  defaultValue?: Expr;
}

export interface StructDeclaration extends NodeBase {
  kind: "struct";
  name: string;
  fields: StructFieldDecl[];
}

export interface TypeclassMethod extends NodeBase {
  kind: "typeclass_method";
  name: string;
  type: TypeExpr;
}

export interface TypeclassDeclaration extends NodeBase {
  kind: "typeclass";
  name: string;
  typeParam: string;
  methods: TypeclassMethod[];
}

export interface InstanceMethod extends NodeBase {
  kind: "instance_method";
  name: string;
  parameters: Parameter[];
  body: Expr;
}

export interface InstanceDeclaration extends NodeBase {
  kind: "instance";
  className: string;
  type: TypeExpr;
  methods: InstanceMethod[];
}

export interface ModuleDeclaration extends NodeBase {
  kind: "module";
  name: string;
  declarations: Declaration[];
}

export interface ImportDeclaration extends NodeBase {
  kind: "import";
  module: string;
  // Undefined imports every public member
  names?: string[];
}

export type Declaration =
  | LetDeclaration
  | StructDeclaration
  | TypeclassDeclaration
  | InstanceDeclaration
  | ModuleDeclaration
  | ImportDeclaration
  | ExprStatement;

export interface Program {
  declarations: Declaration[];
  nextNodeId: NodeId;
}
