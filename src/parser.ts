import type { Token } from "./token.js";
import {
  expectedTokenError,
  type ParseError,
  unterminatedConstructError,
} from "./error.js";
import type {
  BlockExpr,
  BlockStatement,
  ComprehensionGenerator,
  Declaration,
  Expr,
  ExprStatement,
  ImportDeclaration,
  InstanceDeclaration,
  InstanceMethod,
  LetDeclaration,
  Literal,
  MatchArm,
  ModuleDeclaration,
  NodeId,
  Parameter,
  Pattern,
  Program,
  SourceSpan,
  StructDeclaration,
  StructFieldDecl,
  StructFieldInit,
  StructPatternField,
  TypeclassDeclaration,
  TypeclassMethod,
  TypeExpr,
} from "./ast.js";

export type Associativity = "left" | "right" | "none";

export type OperatorInfo = { precedence: number; associativity: Associativity };

// `^` and the prefix operators bind tighter than every entry here and are
// handled by parseUnaryExpression / parsePowerExpression.
const BINARY_OPERATORS = new Map<string, OperatorInfo>([
  ["||", { precedence: 1, associativity: "left" }],
  ["&&", { precedence: 2, associativity: "left" }],
  ["==", { precedence: 3, associativity: "left" }],
  ["!=", { precedence: 3, associativity: "left" }],
  ["<", { precedence: 4, associativity: "left" }],
  ["<=", { precedence: 4, associativity: "left" }],
  [">", { precedence: 4, associativity: "left" }],
  [">=", { precedence: 4, associativity: "left" }],
  ["..", { precedence: 5, associativity: "none" }],
  ["..=", { precedence: 5, associativity: "none" }],
  ["+", { precedence: 6, associativity: "left" }],
  ["-", { precedence: 6, associativity: "left" }],
  ["*", { precedence: 7, associativity: "left" }],
  ["/", { precedence: 7, associativity: "left" }],
  ["%", { precedence: 7, associativity: "left" }],
]);

export interface ParseOptions {
  // Sessions continue numbering so node ids stay unique across entries
  firstNodeId?: number;
}

export function parseProgram(tokens: Token[], options: ParseOptions = {}): Program {
  const parser = new Parser(tokens, options.firstNodeId ?? 0);
  return parser.parseProgram();
}

interface OpenConstruct {
  construct: string;
  token: Token;
}

class Parser {
  private index = 0;
  private nodeIds: number;
  private readonly tokens: Token[];
  private readonly open: OpenConstruct[] = [];

  constructor(tokens: Token[], firstNodeId: number) {
    this.tokens = tokens.filter((token) => token.kind !== "comment");
    this.nodeIds = firstNodeId;
  }

  parseProgram(): Program {
    const declarations: Declaration[] = [];
    while (!this.isEOF()) {
      declarations.push(this.parseDeclaration());
      while (this.matchSymbol(";")) {
        // separators are optional and may repeat
      }
    }
    return { declarations, nextNodeId: this.nodeIds };
  }

  private parseDeclaration(): Declaration {
    const token = this.peek();
    if (token.kind === "symbol" && token.value === "@") {
      return this.parseAttributedLet();
    }
    if (token.kind === "keyword") {
      switch (token.value) {
        case "let": {
          const declaration = this.parseLetDeclaration([]);
          if (this.checkKeyword("in")) {
            return this.expressionStatement(this.finishLetIn(declaration));
          }
          return declaration;
        }
        case "struct":
          return this.parseStructDeclaration();
        case "typeclass":
          return this.parseTypeclassDeclaration();
        case "instance":
          return this.parseInstanceDeclaration();
        case "module":
          return this.parseModuleDeclaration();
        case "import":
          return this.parseImportDeclaration();
      }
    }
    return this.expressionStatement(this.parseExpression());
  }

  private expressionStatement(expression: Expr): ExprStatement {
    return {
      kind: "expr_statement",
      expression,
      span: expression.span,
      id: this.nextId(),
    };
  }

  private parseAttributedLet(): LetDeclaration {
    const attributes: string[] = [];
    while (this.matchSymbol("@")) {
      attributes.push(this.expectIdentifier().value);
    }
    if (!this.checkKeyword("let")) {
      throw this.expected("keyword 'let' after attribute");
    }
    return this.parseLetDeclaration(attributes);
  }

  private parseLetDeclaration(attributes: string[]): LetDeclaration {
    const letToken = this.expectKeyword("let");
    const mutable = this.matchKeyword("mut");
    const nameToken = this.expectIdentifier();
    let annotation: TypeExpr | undefined;
    if (this.matchSymbol(":")) {
      annotation = this.parseTypeExpr();
    }
    this.expectSymbol("=");
    const value = this.parseExpression();
    return {
      kind: "let",
      name: nameToken.value,
      nameSpan: this.tokenSpan(nameToken),
      mutable,
      annotation,
      value,
      isRecursive: value.kind === "lambda",
      attributes,
      span: this.spanFrom(this.tokenSpan(letToken), value.span.end),
      id: this.nextId(),
    };
  }

  private finishLetIn(declaration: LetDeclaration): Expr {
    this.expectKeyword("in");
    const body = this.parseExpression();
    return {
      kind: "let_in",
      declaration,
      body,
      span: this.spanFrom(declaration.span, body.span.end),
      id: this.nextId(),
    };
  }

  private parseStructDeclaration(): StructDeclaration {
    const structToken = this.expectKeyword("struct");
    const name = this.expectConstructor("struct name");
    const fields: StructFieldDecl[] = [];
    this.withOpen("struct declaration", this.expectSymbol("{"), () => {
      while (!this.checkSymbol("}")) {
        const fieldName = this.expectIdentifier();
        this.expectSymbol(":");
        const type = this.parseTypeExpr();
        let defaultValue: Expr | undefined;
        if (this.matchSymbol("=")) {
          defaultValue = this.parseExpression();
        }
        fields.push({
          kind: "struct_field",
          name: fieldName.value,
          type,
          defaultValue,
          span: this.spanFrom(this.tokenSpan(fieldName), this.previous().end),
          id: this.nextId(),
        });
        this.skipSeparators();
      }
      this.expectSymbol("}");
    });
    return {
      kind: "struct",
      name: name.value,
      fields,
      span: this.spanFrom(this.tokenSpan(structToken), this.previous().end),
      id: this.nextId(),
    };
  }

  private parseTypeclassDeclaration(): TypeclassDeclaration {
    const classToken = this.expectKeyword("typeclass");
    const name = this.expectConstructor("typeclass name");
    const typeParam = this.expectTypeName();
    const methods: TypeclassMethod[] = [];
    this.withOpen("typeclass declaration", this.expectSymbol("{"), () => {
      while (!this.checkSymbol("}")) {
        const methodName = this.expectIdentifier();
        this.expectSymbol(":");
        const type = this.parseTypeExpr();
        methods.push({
          kind: "typeclass_method",
          name: methodName.value,
          type,
          span: this.spanFrom(this.tokenSpan(methodName), type.span.end),
          id: this.nextId(),
        });
        this.skipSeparators();
      }
      this.expectSymbol("}");
    });
    return {
      kind: "typeclass",
      name: name.value,
      typeParam: typeParam.value,
      methods,
      span: this.spanFrom(this.tokenSpan(classToken), this.previous().end),
      id: this.nextId(),
    };
  }

  private parseInstanceDeclaration(): InstanceDeclaration {
    const instanceToken = this.expectKeyword("instance");
    const className = this.expectConstructor("typeclass name");
    const type = this.parseTypePrimary();
    const methods: InstanceMethod[] = [];
    this.withOpen("instance declaration", this.expectSymbol("{"), () => {
      while (!this.checkSymbol("}")) {
        const methodName = this.expectIdentifier();
        const parameters = this.parseParameterList();
        this.expectSymbol("=");
        const body = this.parseExpression();
        methods.push({
          kind: "instance_method",
          name: methodName.value,
          parameters,
          body,
          span: this.spanFrom(this.tokenSpan(methodName), body.span.end),
          id: this.nextId(),
        });
        this.skipSeparators();
      }
      this.expectSymbol("}");
    });
    return {
      kind: "instance",
      className: className.value,
      type,
      methods,
      span: this.spanFrom(this.tokenSpan(instanceToken), this.previous().end),
      id: this.nextId(),
    };
  }

  private parseModuleDeclaration(): ModuleDeclaration {
    const moduleToken = this.expectKeyword("module");
    const name = this.expectModuleName();
    const declarations: Declaration[] = [];
    this.withOpen("module", this.expectSymbol("{"), () => {
      while (!this.checkSymbol("}")) {
        if (this.isEOF()) {
          throw this.expected("'}'");
        }
        declarations.push(this.parseDeclaration());
        this.skipSeparators();
      }
      this.expectSymbol("}");
    });
    return {
      kind: "module",
      name: name.value,
      declarations,
      span: this.spanFrom(this.tokenSpan(moduleToken), this.previous().end),
      id: this.nextId(),
    };
  }

  private parseImportDeclaration(): ImportDeclaration {
    const importToken = this.expectKeyword("import");
    const module = this.expectModuleName();
    let names: string[] | undefined;
    if (this.checkSymbol("{")) {
      const imported: string[] = [];
      this.withOpen("import list", this.expectSymbol("{"), () => {
        while (!this.checkSymbol("}")) {
          imported.push(this.expectIdentifier().value);
          if (!this.matchSymbol(",")) {
            break;
          }
        }
        this.expectSymbol("}");
      });
      names = imported;
    }
    return {
      kind: "import",
      module: module.value,
      names,
      span: this.spanFrom(this.tokenSpan(importToken), this.previous().end),
      id: this.nextId(),
    };
  }

  // ==========================================================================
  // Expressions
  // ==========================================================================

  parseExpression(): Expr {
    const token = this.peek();
    if (token.kind === "keyword" && token.value === "let") {
      return this.finishLetIn(this.parseLetDeclaration([]));
    }
    if (
      token.kind === "identifier" &&
      this.peek(1).kind === "symbol" && this.peek(1).value === "="
    ) {
      return this.parseAssignment();
    }
    if (
      token.kind === "identifier" &&
      this.peek(1).kind === "symbol" && this.peek(1).value === "=>"
    ) {
      return this.parseSingleParameterLambda();
    }
    if (token.kind === "symbol" && token.value === "(") {
      const lambda = this.tryParseLambda();
      if (lambda) {
        return lambda;
      }
    }
    return this.parseBinaryExpression();
  }

  private parseAssignment(): Expr {
    const name = this.expectIdentifier();
    this.expectSymbol("=");
    const value = this.parseExpression();
    return {
      kind: "assign",
      name: name.value,
      value,
      span: this.spanFrom(this.tokenSpan(name), value.span.end),
      id: this.nextId(),
    };
  }

  private parseSingleParameterLambda(): Expr {
    const name = this.expectIdentifier();
    this.expectSymbol("=>");
    const body = this.parseExpression();
    return {
      kind: "lambda",
      parameters: [{
        kind: "parameter",
        name: name.value,
        span: this.tokenSpan(name),
        id: this.nextId(),
      }],
      body,
      span: this.spanFrom(this.tokenSpan(name), body.span.end),
      id: this.nextId(),
    };
  }

  private tryParseLambda(): Expr | null {
    const snapshot = this.index;
    const openDepth = this.open.length;
    let header: { parameters: Parameter[]; returnAnnotation?: TypeExpr; start: Token } | null = null;
    try {
      header = this.tryParseLambdaHeader();
    } catch (_error) {
      // Only failures while scanning the parameter list backtrack.
      header = null;
    }
    if (!header) {
      this.index = snapshot;
      this.open.length = openDepth;
      return null;
    }
    const body = this.parseExpression();
    return {
      kind: "lambda",
      parameters: header.parameters,
      returnAnnotation: header.returnAnnotation,
      body,
      span: this.spanFrom(this.tokenSpan(header.start), body.span.end),
      id: this.nextId(),
    };
  }

  private tryParseLambdaHeader(): {
    parameters: Parameter[];
    returnAnnotation?: TypeExpr;
    start: Token;
  } | null {
    const start = this.peek();
    const parameters = this.parseParameterList();
    let returnAnnotation: TypeExpr | undefined;
    if (this.matchSymbol("->")) {
      returnAnnotation = this.parseTypeExpr();
    }
    if (!this.matchSymbol("=>")) {
      return null;
    }
    return { parameters, returnAnnotation, start };
  }

  private parseParameterList(): Parameter[] {
    const parameters: Parameter[] = [];
    this.withOpen("parameter list", this.expectSymbol("("), () => {
      while (!this.checkSymbol(")")) {
        const name = this.expectIdentifier();
        let annotation: TypeExpr | undefined;
        if (this.matchSymbol(":")) {
          annotation = this.parseTypeExpr();
        }
        parameters.push({
          kind: "parameter",
          name: name.value,
          annotation,
          span: this.spanFrom(this.tokenSpan(name), this.previous().end),
          id: this.nextId(),
        });
        if (!this.matchSymbol(",")) {
          break;
        }
      }
      this.expectSymbol(")");
    });
    return parameters;
  }

  private parseBinaryExpression(minPrecedence = 1): Expr {
    let left = this.parseUnaryExpression();

    while (true) {
      const token = this.peek();
      if (token.kind !== "operator" && token.kind !== "symbol") {
        break;
      }
      const opInfo = BINARY_OPERATORS.get(token.value);
      if (!opInfo || opInfo.precedence < minPrecedence) {
        break;
      }

      const operator = this.consume().value;
      const nextMinPrecedence = opInfo.associativity === "right"
        ? opInfo.precedence
        : opInfo.precedence + 1;
      const right = this.parseBinaryExpression(nextMinPrecedence);
      const span = this.spanFrom(left.span, right.span.end);

      if (operator === ".." || operator === "..=") {
        left = {
          kind: "range",
          start: left,
          end: right,
          inclusive: operator === "..=",
          span,
          id: this.nextId(),
        };
        continue;
      }

      left = {
        kind: "binary",
        operator,
        left,
        right,
        span,
        id: this.nextId(),
      };
    }

    return left;
  }

  private parseUnaryExpression(): Expr {
    const token = this.peek();
    if (token.kind === "operator" && (token.value === "-" || token.value === "!")) {
      const opToken = this.consume();
      const operand = this.parseUnaryExpression();
      return {
        kind: "unary",
        operator: opToken.value,
        operand,
        span: this.spanFrom(this.tokenSpan(opToken), operand.span.end),
        id: this.nextId(),
      };
    }
    return this.parsePowerExpression();
  }

  private parsePowerExpression(): Expr {
    const base = this.parsePostfixExpression();
    const token = this.peek();
    if (token.kind === "operator" && token.value === "^") {
      this.consume();
      // Right associative: 2 ^ 3 ^ 2 is 2 ^ (3 ^ 2)
      const exponent = this.parseUnaryExpression();
      return {
        kind: "binary",
        operator: "^",
        left: base,
        right: exponent,
        span: this.spanFrom(base.span, exponent.span.end),
        id: this.nextId(),
      };
    }
    return base;
  }

  private parsePostfixExpression(): Expr {
    let expr = this.parsePrimaryExpression();
    while (true) {
      // A call or index must start on the line of the expression it applies to
      if (this.checkSymbol("(") && this.peek().line === this.previous().line) {
        const open = this.consume();
        const args: Expr[] = [];
        this.withOpen("argument list", open, () => {
          while (!this.checkSymbol(")")) {
            args.push(this.parseExpression());
            if (!this.matchSymbol(",")) {
              break;
            }
          }
          this.expectSymbol(")");
        });
        expr = {
          kind: "call",
          callee: expr,
          arguments: args,
          span: this.spanFrom(expr.span, this.previous().end),
          id: this.nextId(),
        };
        continue;
      }

      if (this.checkSymbol("[") && this.peek().line === this.previous().line) {
        const open = this.consume();
        const target = expr;
        const index = this.withOpen("index", open, () => {
          const inner = this.parseExpression();
          this.expectSymbol("]");
          return inner;
        });
        expr = {
          kind: "index",
          target,
          index,
          span: this.spanFrom(target.span, this.previous().end),
          id: this.nextId(),
        };
        continue;
      }

      if (this.matchSymbol(".")) {
        const fieldToken = this.expectIdentifier();
        const target = expr;
        expr = {
          kind: "field_access",
          target,
          field: fieldToken.value,
          span: this.spanFrom(target.span, fieldToken.end),
          id: this.nextId(),
        };
        continue;
      }

      break;
    }
    return expr;
  }

  private parsePrimaryExpression(): Expr {
    const token = this.peek();
    switch (token.kind) {
      case "identifier": {
        const ident = this.consume();
        return {
          kind: "identifier",
          name: ident.value,
          span: this.tokenSpan(ident),
          id: this.nextId(),
        };
      }
      case "constructor": {
        if (this.looksLikeStructLiteral()) {
          return this.parseStructLiteral();
        }
        // Module names used as qualifiers, e.g. `Geometry.area`
        const ctor = this.consume();
        return {
          kind: "identifier",
          name: ctor.value,
          span: this.tokenSpan(ctor),
          id: this.nextId(),
        };
      }
      case "number":
      case "float":
      case "string":
      case "bool": {
        const literal = this.parseLiteralToken();
        return {
          kind: "literal",
          literal,
          span: literal.span,
          id: this.nextId(),
        };
      }
      case "symbol": {
        if (token.value === "(") {
          return this.parseParenExpression();
        }
        if (token.value === "[") {
          return this.parseArrayLike();
        }
        if (token.value === "{") {
          return this.parseBlockExpr();
        }
        break;
      }
      case "keyword": {
        switch (token.value) {
          case "if":
            return this.parseIfExpression();
          case "match":
            return this.parseMatchExpression();
          case "parallel":
            return this.parseParallelExpression();
          case "spawn": {
            const spawnToken = this.consume();
            const body = this.checkSymbol("{") ? this.parseBlockExpr() : this.parseExpression();
            return {
              kind: "spawn",
              body,
              span: this.spanFrom(this.tokenSpan(spawnToken), body.span.end),
              id: this.nextId(),
            };
          }
          case "wait": {
            const waitToken = this.consume();
            const target = this.parsePostfixExpression();
            return {
              kind: "wait",
              target,
              span: this.spanFrom(this.tokenSpan(waitToken), target.span.end),
              id: this.nextId(),
            };
          }
        }
        break;
      }
    }
    throw this.expected("expression", token);
  }

  private parseLiteralToken(): Literal {
    const token = this.consume();
    const span = this.tokenSpan(token);
    switch (token.kind) {
      case "number":
        return { kind: "int", value: Number(token.value), span, id: this.nextId() };
      case "float":
        return { kind: "float", value: Number(token.value), span, id: this.nextId() };
      case "string":
        return { kind: "string", value: token.value, span, id: this.nextId() };
      case "bool":
        return { kind: "bool", value: token.value === "true", span, id: this.nextId() };
      default:
        throw this.expected("literal", token);
    }
  }

  private parseParenExpression(): Expr {
    const open = this.expectSymbol("(");
    if (this.matchSymbol(")")) {
      const span = this.spanFrom(this.tokenSpan(open), this.previous().end);
      return {
        kind: "literal",
        literal: { kind: "unit", span, id: this.nextId() },
        span,
        id: this.nextId(),
      };
    }
    return this.withOpen("parenthesized expression", open, () => {
      const inner = this.parseExpression();
      this.expectSymbol(")");
      return inner;
    });
  }

  private parseArrayLike(): Expr {
    const open = this.expectSymbol("[");
    const elements: Expr[] = [];

    const comprehension = this.withOpen("array literal", open, (): Expr | null => {
      if (this.matchSymbol("]")) {
        return null;
      }
      const first = this.parseExpression();
      if (this.matchSymbol("|")) {
        return this.parseComprehensionTail(open, first);
      }
      elements.push(first);
      while (this.matchSymbol(",")) {
        if (this.checkSymbol("]")) {
          break;
        }
        elements.push(this.parseExpression());
      }
      this.expectSymbol("]");
      return null;
    });

    if (comprehension) {
      return comprehension;
    }

    const span = this.spanFrom(this.tokenSpan(open), this.previous().end);
    const rows = asMatrixRows(elements);
    if (rows) {
      return { kind: "matrix", rows, span, id: this.nextId() };
    }
    return { kind: "array", elements, span, id: this.nextId() };
  }

  private parseComprehensionTail(open: Token, body: Expr): Expr {
    const generators: ComprehensionGenerator[] = [];
    const filters: Expr[] = [];
    do {
      const token = this.peek();
      const next = this.peek(1);
      if (token.kind === "identifier" && next.kind === "keyword" && next.value === "in") {
        this.consume();
        this.consume();
        const iterable = this.parseExpression();
        generators.push({
          kind: "generator",
          variable: token.value,
          iterable,
          span: this.spanFrom(this.tokenSpan(token), iterable.span.end),
          id: this.nextId(),
        });
      } else {
        filters.push(this.parseExpression());
      }
    } while (this.matchSymbol(","));
    this.expectSymbol("]");
    if (generators.length === 0) {
      throw this.expected("generator 'name in expression'", this.previous());
    }
    return {
      kind: "comprehension",
      body,
      generators,
      filters,
      span: this.spanFrom(this.tokenSpan(open), this.previous().end),
      id: this.nextId(),
    };
  }

  private parseBlockExpr(): BlockExpr {
    const open = this.expectSymbol("{");
    const statements: BlockStatement[] = [];

    const result = this.withOpen("block", open, (): Expr | undefined => {
      let result: Expr | undefined;
      while (!this.checkSymbol("}")) {
        if (this.isEOF()) {
          throw this.expected("'}'");
        }
        if (result) {
          // The previous expression was not the last one after all
          statements.push(this.expressionStatement(result));
          result = undefined;
        }
        if (this.checkKeyword("let")) {
          const declaration = this.parseLetDeclaration([]);
          if (this.checkKeyword("in")) {
            result = this.finishLetIn(declaration);
          } else {
            statements.push({
              kind: "let_statement",
              declaration,
              span: declaration.span,
              id: this.nextId(),
            });
          }
        } else {
          result = this.parseExpression();
        }
        if (this.matchSymbol(";")) {
          if (result) {
            statements.push(this.expressionStatement(result));
            result = undefined;
          }
          this.skipSeparators();
        }
      }
      this.expectSymbol("}");
      return result;
    });

    return {
      kind: "block",
      statements,
      result,
      span: this.spanFrom(this.tokenSpan(open), this.previous().end),
      id: this.nextId(),
    };
  }

  private parseIfExpression(): Expr {
    const ifToken = this.expectKeyword("if");
    const condition = this.parseExpression();
    let thenBranch: Expr;
    if (this.matchKeyword("then")) {
      thenBranch = this.parseExpression();
    } else if (this.checkSymbol("{")) {
      thenBranch = this.parseBlockExpr();
    } else {
      throw this.expected("keyword 'then' or '{'");
    }
    let elseBranch: Expr | undefined;
    if (this.matchKeyword("else")) {
      elseBranch = this.parseExpression();
    }
    const end = elseBranch ?? thenBranch;
    return {
      kind: "if",
      condition,
      thenBranch,
      elseBranch,
      span: this.spanFrom(this.tokenSpan(ifToken), end.span.end),
      id: this.nextId(),
    };
  }

  private parseMatchExpression(): Expr {
    const matchToken = this.expectKeyword("match");
    const scrutinee = this.parseExpression();
    const arms: MatchArm[] = [];
    this.withOpen("match expression", this.expectSymbol("{"), () => {
      while (!this.checkSymbol("}")) {
        if (this.isEOF()) {
          throw this.expected("'}'");
        }
        const pattern = this.parsePattern();
        let guard: Expr | undefined;
        if (this.matchKeyword("if")) {
          guard = this.parseExpression();
        }
        this.expectSymbol("=>");
        const body = this.parseExpression();
        arms.push({
          kind: "match_arm",
          pattern,
          guard,
          body,
          span: this.spanFrom(pattern.span, body.span.end),
          id: this.nextId(),
        });
        this.skipSeparators();
      }
      this.expectSymbol("}");
    });
    return {
      kind: "match",
      scrutinee,
      arms,
      span: this.spanFrom(this.tokenSpan(matchToken), this.previous().end),
      id: this.nextId(),
    };
  }

  private parseParallelExpression(): Expr {
    const parallelToken = this.expectKeyword("parallel");
    const block = this.parseBlockExpr();
    const statements = [...block.statements];
    if (block.result) {
      statements.push(this.expressionStatement(block.result));
    }
    return {
      kind: "parallel",
      statements,
      span: this.spanFrom(this.tokenSpan(parallelToken), block.span.end),
      id: this.nextId(),
    };
  }

  private looksLikeStructLiteral(): boolean {
    const brace = this.peek(1);
    if (brace.kind !== "symbol" || brace.value !== "{") {
      return false;
    }
    const first = this.peek(2);
    if (first.kind === "symbol" && first.value === "}") {
      return true;
    }
    if (first.kind !== "identifier") {
      return false;
    }
    const after = this.peek(3);
    return after.kind === "symbol" &&
      (after.value === ":" || after.value === "," || after.value === "}");
  }

  private parseStructLiteral(): Expr {
    const name = this.expectConstructor("struct name");
    const fields: StructFieldInit[] = [];
    this.withOpen("struct literal", this.expectSymbol("{"), () => {
      while (!this.checkSymbol("}")) {
        const fieldName = this.expectIdentifier();
        let value: Expr;
        if (this.matchSymbol(":")) {
          value = this.parseExpression();
        } else {
          // `Point { x }` is shorthand for `Point { x: x }`
          value = {
            kind: "identifier",
            name: fieldName.value,
            span: this.tokenSpan(fieldName),
            id: this.nextId(),
          };
        }
        fields.push({
          kind: "struct_field_init",
          name: fieldName.value,
          value,
          span: this.spanFrom(this.tokenSpan(fieldName), value.span.end),
          id: this.nextId(),
        });
        if (!this.matchSymbol(",")) {
          break;
        }
      }
      this.expectSymbol("}");
    });
    return {
      kind: "struct_literal",
      name: name.value,
      fields,
      span: this.spanFrom(this.tokenSpan(name), this.previous().end),
      id: this.nextId(),
    };
  }

  // ==========================================================================
  // Types
  // ==========================================================================

  private parseTypeExpr(): TypeExpr {
    const start = this.peek();
    if (start.kind === "symbol" && start.value === "(") {
      const open = this.consume();
      const parameters: TypeExpr[] = [];
      this.withOpen("type", open, () => {
        while (!this.checkSymbol(")")) {
          parameters.push(this.parseTypeExpr());
          if (!this.matchSymbol(",")) {
            break;
          }
        }
        this.expectSymbol(")");
      });
      if (this.matchSymbol("->")) {
        const result = this.parseTypeExpr();
        return {
          kind: "type_fn",
          parameters,
          result,
          span: this.spanFrom(this.tokenSpan(open), result.span.end),
          id: this.nextId(),
        };
      }
      if (parameters.length === 1) {
        return parameters[0];
      }
      if (parameters.length === 0) {
        return {
          kind: "type_ref",
          name: "Unit",
          typeArgs: [],
          span: this.spanFrom(this.tokenSpan(open), this.previous().end),
          id: this.nextId(),
        };
      }
      throw this.expected("'->' after parameter types");
    }

    const primary = this.parseTypePrimary();
    if (this.matchSymbol("->")) {
      const result = this.parseTypeExpr();
      return {
        kind: "type_fn",
        parameters: [primary],
        result,
        span: this.spanFrom(primary.span, result.span.end),
        id: this.nextId(),
      };
    }
    return primary;
  }

  private parseTypePrimary(): TypeExpr {
    const token = this.peek();
    if (token.kind === "symbol" && token.value === "[") {
      const open = this.consume();
      const element = this.withOpen("array type", open, () => {
        const inner = this.parseTypeExpr();
        this.expectSymbol("]");
        return inner;
      });
      return {
        kind: "type_array",
        element,
        span: this.spanFrom(this.tokenSpan(open), this.previous().end),
        id: this.nextId(),
      };
    }
    if (token.kind === "symbol" && token.value === "(") {
      return this.parseTypeExpr();
    }

    const name = this.expectTypeName();
    const span = this.tokenSpan(name);
    if (name.kind === "identifier" || name.value.length === 1) {
      return { kind: "type_var", name: name.value, span, id: this.nextId() };
    }
    const typeArgs: TypeExpr[] = [];
    if (this.checkOperator("<")) {
      const open = this.consume();
      this.withOpen("type arguments", open, () => {
        do {
          typeArgs.push(this.parseTypeExpr());
        } while (this.matchSymbol(","));
        if (!this.checkOperator(">")) {
          throw this.expected("'>'");
        }
        this.consume();
      });
    }
    return {
      kind: "type_ref",
      name: name.value,
      typeArgs,
      span: this.spanFrom(span, this.previous().end),
      id: this.nextId(),
    };
  }

  // ==========================================================================
  // Patterns
  // ==========================================================================

  private parsePattern(): Pattern {
    const token = this.peek();
    if (token.kind === "symbol" && token.value === "_") {
      const underscore = this.consume();
      return { kind: "wildcard", span: this.tokenSpan(underscore), id: this.nextId() };
    }

    if (token.kind === "identifier") {
      const ident = this.consume();
      return {
        kind: "variable",
        name: ident.value,
        span: this.tokenSpan(ident),
        id: this.nextId(),
      };
    }

    if (
      token.kind === "number" || token.kind === "float" ||
      token.kind === "string" || token.kind === "bool"
    ) {
      const literal = this.parseLiteralToken();
      return { kind: "literal", literal, span: literal.span, id: this.nextId() };
    }

    if (token.kind === "operator" && token.value === "-") {
      const minus = this.consume();
      const number = this.peek();
      if (number.kind !== "number" && number.kind !== "float") {
        throw this.expected("number after '-'", number);
      }
      const parsed = this.parseLiteralToken();
      const span = this.spanFrom(this.tokenSpan(minus), parsed.span.end);
      const value = parsed.kind === "int" || parsed.kind === "float" ? -parsed.value : 0;
      const literal: Literal = parsed.kind === "float"
        ? { kind: "float", value, span, id: this.nextId() }
        : { kind: "int", value, span, id: this.nextId() };
      return { kind: "literal", literal, span, id: this.nextId() };
    }

    if (token.kind === "constructor") {
      return this.parseStructPattern();
    }

    if (token.kind === "symbol" && token.value === "[") {
      return this.parseArrayPattern();
    }

    throw this.expected("pattern", token);
  }

  private parseStructPattern(): Pattern {
    const name = this.expectConstructor("struct name");
    const fields: StructPatternField[] = [];
    if (this.checkSymbol("{")) {
      this.withOpen("struct pattern", this.consume(), () => {
        while (!this.checkSymbol("}")) {
          const fieldName = this.expectIdentifier();
          let pattern: Pattern;
          if (this.matchSymbol(":")) {
            pattern = this.parsePattern();
          } else {
            pattern = {
              kind: "variable",
              name: fieldName.value,
              span: this.tokenSpan(fieldName),
              id: this.nextId(),
            };
          }
          fields.push({
            kind: "struct_pattern_field",
            name: fieldName.value,
            pattern,
            span: this.spanFrom(this.tokenSpan(fieldName), pattern.span.end),
            id: this.nextId(),
          });
          if (!this.matchSymbol(",")) {
            break;
          }
        }
        this.expectSymbol("}");
      });
    }
    return {
      kind: "struct",
      name: name.value,
      fields,
      span: this.spanFrom(this.tokenSpan(name), this.previous().end),
      id: this.nextId(),
    };
  }

  private parseArrayPattern(): Pattern {
    const open = this.expectSymbol("[");
    const elements: Pattern[] = [];
    const rest = this.withOpen("array pattern", open, (): Pattern | undefined => {
      let rest: Pattern | undefined;
      while (!this.checkSymbol("]")) {
        if (this.checkSymbol("..")) {
          const dots = this.consume();
          rest = this.checkSymbol("]")
            ? { kind: "wildcard", span: this.tokenSpan(dots), id: this.nextId() }
            : this.parsePattern();
          break;
        }
        elements.push(this.parsePattern());
        if (!this.matchSymbol(",")) {
          break;
        }
      }
      this.expectSymbol("]");
      return rest;
    });
    return {
      kind: "array",
      elements,
      rest,
      span: this.spanFrom(this.tokenSpan(open), this.previous().end),
      id: this.nextId(),
    };
  }

  // ==========================================================================
  // Token helpers
  // ==========================================================================

  private nextId(): NodeId {
    return this.nodeIds++;
  }

  private withOpen<T>(construct: string, token: Token, body: () => T): T {
    this.open.push({ construct, token });
    try {
      return body();
    } finally {
      this.open.pop();
    }
  }

  private tokenSpan(token: Token): SourceSpan {
    return { start: token.start, end: token.end, line: token.line, column: token.column };
  }

  private spanFrom(start: SourceSpan, end: number): SourceSpan {
    return { start: start.start, end, line: start.line, column: start.column };
  }

  private skipSeparators(): void {
    while (this.matchSymbol(",") || this.matchSymbol(";")) {
      // consume
    }
  }

  private expectKeyword(value: string): Token {
    const token = this.peek();
    if (token.kind !== "keyword" || token.value !== value) {
      throw this.expected(`keyword '${value}'`, token);
    }
    return this.consume();
  }

  private expectIdentifier(): Token {
    const token = this.peek();
    if (token.kind !== "identifier") {
      throw this.expected("identifier", token);
    }
    return this.consume();
  }

  private expectConstructor(message = "constructor"): Token {
    const token = this.peek();
    if (token.kind !== "constructor") {
      throw this.expected(message, token);
    }
    return this.consume();
  }

  private expectModuleName(): Token {
    const token = this.peek();
    if (token.kind === "identifier" || token.kind === "constructor") {
      return this.consume();
    }
    throw this.expected("module name", token);
  }

  private expectTypeName(): Token {
    const token = this.peek();
    if (token.kind === "identifier" || token.kind === "constructor") {
      return this.consume();
    }
    throw this.expected("type name", token);
  }

  private expectSymbol(value: string): Token {
    const token = this.peek();
    if (token.kind !== "symbol" || token.value !== value) {
      throw this.expected(`'${value}'`, token);
    }
    return this.consume();
  }

  private matchSymbol(value: string): boolean {
    if (this.checkSymbol(value)) {
      this.consume();
      return true;
    }
    return false;
  }

  private matchKeyword(value: string): boolean {
    if (this.checkKeyword(value)) {
      this.consume();
      return true;
    }
    return false;
  }

  private checkSymbol(value: string): boolean {
    const token = this.peek();
    return token.kind === "symbol" && token.value === value;
  }

  private checkKeyword(value: string): boolean {
    const token = this.peek();
    return token.kind === "keyword" && token.value === value;
  }

  private checkOperator(value: string): boolean {
    const token = this.peek();
    return token.kind === "operator" && token.value === value;
  }

  private consume(): Token {
    const token = this.peek();
    if (token.kind !== "eof") {
      this.index++;
    }
    return token;
  }

  private peek(offset = 0): Token {
    const index = this.index + offset;
    if (index >= this.tokens.length) {
      return this.tokens[this.tokens.length - 1];
    }
    return this.tokens[index];
  }

  private previous(): Token {
    return this.tokens[Math.max(0, this.index - 1)];
  }

  private isEOF(): boolean {
    return this.peek().kind === "eof";
  }

  // Running out of input inside a bracket reports the bracket, not the token
  private expected(expected: string, token: Token = this.peek()): ParseError {
    const innermost = this.open[this.open.length - 1];
    if (token.kind === "eof" && innermost) {
      return unterminatedConstructError(innermost.construct, innermost.token);
    }
    return expectedTokenError(expected, token);
  }
}

function asMatrixRows(elements: Expr[]): Expr[][] | null {
  if (elements.length === 0) {
    return null;
  }
  const rows: Expr[][] = [];
  for (const element of elements) {
    if (element.kind !== "array" || element.elements.length === 0) {
      return null;
    }
    rows.push(element.elements);
  }
  const width = rows[0].length;
  return rows.every((row) => row.length === width) ? rows : null;
}
