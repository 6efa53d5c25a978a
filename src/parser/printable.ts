import * as AST from './ast';

export interface PrintableList {
  type: 'StatementList';
  statements: PrintableStatement[];
}

export interface PrintableIf {
  type: 'IfStatement';
  condition: AST.Bexp;
  trueStmt: PrintableStatement;
  falseStmt: PrintableStatement | null;
}

export interface PrintableWhile {
  type: 'WhileStatement';
  condition: AST.Bexp;
  body: PrintableStatement;
}

export type PrintableStatement = AST.AssignStatement | PrintableList | PrintableIf | PrintableWhile;

/**
 * Tree for `--parse` output. Each `CompoundStatement` chain becomes one
 * `StatementList`, so the depth of the result, and of `JSON.stringify` over
 * it, follows the program's nesting rather than its length.
 */
export function toPrintable(stmt: AST.Statement): PrintableStatement {
  const statements = AST.flattenCompound(stmt).map(printSingle);
  return statements.length === 1 ? statements[0] : { type: 'StatementList', statements };
}

function printSingle(stmt: AST.Statement): PrintableStatement {
  switch (stmt.type) {
    case 'AssignStatement':
      return stmt;
    case 'IfStatement':
      return {
        type: 'IfStatement',
        condition: stmt.condition,
        trueStmt: toPrintable(stmt.trueStmt),
        falseStmt: stmt.falseStmt ? toPrintable(stmt.falseStmt) : null,
      };
    case 'WhileStatement':
      return { type: 'WhileStatement', condition: stmt.condition, body: toPrintable(stmt.body) };
    case 'CompoundStatement':
      // Only reachable for a right-nested compound built by hand
      return toPrintable(stmt);
  }
}
