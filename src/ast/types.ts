/**
 * Abstract Syntax Tree (AST) Types for LineScript
 *
 * Architecture:
 *   Line → Tokenizer → Parser → AST → evaluate(ctx) → Value / output
 *
 * The node set is closed: the evaluator switches over `type` exhaustively,
 * so adding a node kind is a compile-time-checked change. Nodes are never
 * mutated after the parser builds them.
 */

// =============================================================================
// LITERALS & NAMES
// =============================================================================

export interface NumberNode {
  readonly type: "Number";
  /** Literal text as written, e.g. "-2.50" */
  readonly raw: string;
  readonly value: number;
}

export interface BooleanNode {
  readonly type: "Boolean";
  readonly value: boolean;
}

export interface StringNode {
  readonly type: "String";
  readonly value: string;
}

export interface VariableNode {
  readonly type: "Variable";
  readonly name: string;
}

// =============================================================================
// STATEMENTS
// =============================================================================

/** name = expression ; */
export interface AssignmentNode {
  readonly type: "Assignment";
  readonly name: string;
  readonly expression: ExpressionNode;
}

/** print expression ; */
export interface PrintNode {
  readonly type: "Print";
  readonly expression: ExpressionNode;
}

// =============================================================================
// OPERATORS
// =============================================================================

export type UnaryOperator = "+" | "-";
export type ArithmeticOperator = "+" | "-" | "*" | "/";
export type ComparisonOperator = "==" | "!=" | "<" | ">";
export type LogicalOperator = "and" | "or";

export interface UnaryNode {
  readonly type: "Unary";
  readonly operator: UnaryOperator;
  readonly operand: ExpressionNode;
}

export interface BinaryNode {
  readonly type: "Binary";
  readonly operator: ArithmeticOperator;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

/** `and` / `or` always have both sides; `not` has only an operand */
export type LogicalNode =
  | {
      readonly type: "Logical";
      readonly operator: LogicalOperator;
      readonly left: ExpressionNode;
      readonly right: ExpressionNode;
    }
  | {
      readonly type: "Logical";
      readonly operator: "not";
      readonly operand: ExpressionNode;
    };

export interface ComparisonNode {
  readonly type: "Comparison";
  readonly operator: ComparisonOperator;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

// =============================================================================
// UNIONS
// =============================================================================

export type ExpressionNode =
  | NumberNode
  | BooleanNode
  | StringNode
  | VariableNode
  | UnaryNode
  | BinaryNode
  | LogicalNode
  | ComparisonNode;

export type StatementNode = AssignmentNode | PrintNode;

export type AstNode = ExpressionNode | StatementNode;

// =============================================================================
// FACTORY FUNCTIONS (for building AST nodes)
// =============================================================================

export const AST = {
  number(raw: string, value: number): NumberNode {
    return { type: "Number", raw, value };
  },

  boolean(value: boolean): BooleanNode {
    return { type: "Boolean", value };
  },

  string(value: string): StringNode {
    return { type: "String", value };
  },

  variable(name: string): VariableNode {
    return { type: "Variable", name };
  },

  assignment(name: string, expression: ExpressionNode): AssignmentNode {
    return { type: "Assignment", name, expression };
  },

  print(expression: ExpressionNode): PrintNode {
    return { type: "Print", expression };
  },

  unary(operator: UnaryOperator, operand: ExpressionNode): UnaryNode {
    return { type: "Unary", operator, operand };
  },

  binary(
    operator: ArithmeticOperator,
    left: ExpressionNode,
    right: ExpressionNode,
  ): BinaryNode {
    return { type: "Binary", operator, left, right };
  },

  logical(
    operator: LogicalOperator,
    left: ExpressionNode,
    right: ExpressionNode,
  ): LogicalNode {
    return { type: "Logical", operator, left, right };
  },

  not(operand: ExpressionNode): LogicalNode {
    return { type: "Logical", operator: "not", operand };
  },

  comparison(
    operator: ComparisonOperator,
    left: ExpressionNode,
    right: ExpressionNode,
  ): ComparisonNode {
    return { type: "Comparison", operator, left, right };
  },
};

// =============================================================================
// DEBUG RENDERING
// =============================================================================

/**
 * Render a node as a fully parenthesised S-expression, e.g.
 * `(+ 1 (* 2 3))`. Used by the shell's `:ast` command and by tests that
 * check grouping.
 */
export function formatAst(node: AstNode): string {
  switch (node.type) {
    case "Number":
      return node.raw;
    case "Boolean":
      return String(node.value);
    case "String":
      return JSON.stringify(node.value);
    case "Variable":
      return node.name;
    case "Assignment":
      return `(= ${node.name} ${formatAst(node.expression)})`;
    case "Print":
      return `(print ${formatAst(node.expression)})`;
    case "Unary":
      return `(${node.operator} ${formatAst(node.operand)})`;
    case "Binary":
    case "Comparison":
      return `(${node.operator} ${formatAst(node.left)} ${formatAst(node.right)})`;
    case "Logical":
      if (node.operator === "not") {
        return `(not ${formatAst(node.operand)})`;
      }
      return `(${node.operator} ${formatAst(node.left)} ${formatAst(node.right)})`;
  }
}
