import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Node, Value } from '../../../src/ast/ast.js';
import { DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';
import { SemanticVisitor } from '../../../src/typecheck/statement.js';
import { enterFunction } from '../../../src/typecheck/context.js';
import { VarType, type AstNode } from '../../../src/types.js';
import { TestFactories, assertDiagnostic } from '../../helpers/test-factories.js';

function check(...statements: AstNode[]) {
  const context = TestFactories.createContext();
  new SemanticVisitor().visitNode(Node.Program(statements), context);
  return context.state;
}

describe('SemanticVisitor', () => {
  describe('声明', () => {
    it('num/bool 声明写入符号表并计入 VAR', () => {
      const state = check(Node.Declaration('num', 'a'), Node.Declaration('bool', 'b'));
      assert.equal(state.symbols.lookup('a'), VarType.Number);
      assert.equal(state.symbols.lookup('b'), VarType.Bool);
      assert.equal(state.metrics.get('VAR'), 2);
    });

    it('未知类型关键字视为语法树错误', () => {
      const decl = Node.Raw('Declaration', [Node.Identifier('s')], { value: 'string' });
      assertDiagnostic(() => check(decl), DiagnosticCode.A001_MalformedTree, "Malformed tree: unknown type keyword 'string'");
    });

    it('Object 原型成员名不是类型关键字', () => {
      const decl = Node.Raw('Declaration', [Node.Identifier('s')], { value: 'constructor' });
      assertDiagnostic(
        () => check(decl),
        DiagnosticCode.A001_MalformedTree,
        "Malformed tree: unknown type keyword 'constructor'"
      );

      const fn = Node.Raw('FunctionStmt', [Node.Identifier('f'), Node.FunctionBlock([Node.ReturnStmt(Value.int(1))])], {
        value: 'toString',
      });
      assertDiagnostic(() => check(fn), DiagnosticCode.A001_MalformedTree, "Malformed tree: unknown type keyword 'toString'");
    });

    it('块内声明同样进入全局扁平符号表', () => {
      const state = check(
        Node.Declaration('bool', 'ok'),
        Node.IfStmt(Value.ref('ok'), Node.Block([Node.Declaration('num', 'inner')])),
        Node.AssignStmt('inner', Value.int(3))
      );
      assert.equal(state.symbols.lookup('inner'), VarType.Number);
    });
  });

  describe('条件语句', () => {
    it('if 条件为 Number 应报 InvalidConditionType', () => {
      assertDiagnostic(
        () => check(Node.Declaration('num', 'n'), Node.IfStmt(Value.ref('n'), Node.Block([]))),
        DiagnosticCode.S004_InvalidConditionType,
        'Invalid type in condition'
      );
    });

    it('while 条件为比较表达式时通过，计数各加一', () => {
      const state = check(
        Node.Declaration('num', 'i'),
        Node.WhileStmt(
          Node.Expr(Node.CompExpr(Value.ref('i'), '<', Value.int(10))),
          Node.Block([Node.Stmt(Node.AssignStmt('i', Node.AddExpr([Value.ref('i'), Value.int(1)], ['+'])))])
        )
      );
      assert.deepEqual(state.metrics.snapshot(), { VAR: 1, WHILE: 1, IF: 0, FUNC: 0, OP: 2 });
    });

    it('if 的每个分支独立检查，分支内错误照常抛出', () => {
      assertDiagnostic(
        () =>
          check(
            Node.Declaration('num', 'x'),
            Node.IfStmt(
              Value.bool(true),
              Node.Block([Node.AssignStmt('x', Value.int(1))]),
              Node.Block([Node.AssignStmt('x', Value.bool(false))])
            )
          ),
        DiagnosticCode.S005_InvalidAssignmentType,
        'Invalid type in assignation of Identifier x'
      );
    });

    it('嵌套条件语句每个节点只计一次', () => {
      const state = check(
        Node.IfStmt(
          Value.bool(true),
          Node.Block([
            Node.WhileStmt(Value.bool(false), Node.Block([])),
            Node.IfStmt(Node.NotExpr(Value.bool(false), 1), Node.Block([])),
          ])
        )
      );
      assert.equal(state.metrics.get('IF'), 2);
      assert.equal(state.metrics.get('WHILE'), 1);
      assert.equal(state.metrics.get('OP'), 1);
    });
  });

  describe('赋值', () => {
    it('类型一致的赋值通过', () => {
      const state = check(Node.Declaration('bool', 'b'), Node.AssignStmt('b', Node.CompExpr(Value.int(1), '>=', Value.int(0))));
      assert.equal(state.metrics.get('OP'), 1);
    });

    it('类型不一致应报 InvalidAssignmentType 并带上标识符名', () => {
      assertDiagnostic(
        () => check(Node.Declaration('num', 'total'), Node.AssignStmt('total', Value.bool(true))),
        DiagnosticCode.S005_InvalidAssignmentType,
        'Invalid type in assignation of Identifier total'
      );
    });

    it('赋值给未声明变量应报 UndefinedIdentifier', () => {
      assertDiagnostic(
        () => check(Node.AssignStmt('z', Value.int(1))),
        DiagnosticCode.S001_UndefinedIdentifier,
        'Invalid use of undefined Identifier z'
      );
    });

    it('右侧读取未声明变量先于目标检查报错', () => {
      assertDiagnostic(
        () => check(Node.Declaration('num', 'a'), Node.AssignStmt('a', Value.ref('q'))),
        DiagnosticCode.S001_UndefinedIdentifier,
        'Invalid use of undefined Identifier q'
      );
    });

    it('赋值目标必须是 Identifier', () => {
      const assign = Node.Raw('AssignStmt', [Value.int(1), Value.int(2)]);
      assertDiagnostic(() => check(assign), DiagnosticCode.A001_MalformedTree, 'Malformed tree: expected Identifier, found IntValue');
    });
  });

  describe('函数与返回', () => {
    it('返回类型匹配时通过，FUNC 计一次', () => {
      const state = check(
        Node.Declaration('num', 'x'),
        Node.FunctionStmt('num', 'twice', [Node.ReturnStmt(Node.MulExpr([Value.ref('x'), Value.int(2)], ['*']))])
      );
      assert.deepEqual(state.metrics.snapshot(), { VAR: 1, WHILE: 0, IF: 0, FUNC: 1, OP: 1 });
    });

    it('返回类型不匹配应报 ReturnTypeMismatch', () => {
      assertDiagnostic(
        () => check(Node.FunctionStmt('bool', 'f', [Node.ReturnStmt(Value.int(1))])),
        DiagnosticCode.S006_ReturnTypeMismatch,
        'Return type does not match function type'
      );
    });

    it('ReturnStmt 直接挂在 FunctionStmt 下同样按函数类型检查', () => {
      const fn = Node.Raw('FunctionStmt', [Node.Identifier('g'), Node.ReturnStmt(Value.bool(true))], { value: 'num' });
      assertDiagnostic(() => check(fn), DiagnosticCode.S006_ReturnTypeMismatch, 'Return type does not match function type');
    });

    it('函数外的 return 应报 ReturnOutsideFunction', () => {
      assertDiagnostic(
        () => check(Node.ReturnStmt(Value.int(0))),
        DiagnosticCode.S007_ReturnOutsideFunction,
        'Return statement outside of function'
      );
    });

    it('嵌套函数中的 return 按最内层函数类型检查', () => {
      const state = check(
        Node.FunctionStmt('bool', 'outer', [
          Node.FunctionStmt('num', 'inner', [Node.ReturnStmt(Value.int(1))]),
          Node.ReturnStmt(Value.bool(true)),
        ])
      );
      assert.equal(state.metrics.get('FUNC'), 2);
    });

    it('条件分支内的 return 仍属于外围函数', () => {
      assertDiagnostic(
        () =>
          check(
            Node.FunctionStmt('num', 'pick', [
              Node.IfStmt(Value.bool(true), Node.Block([Node.ReturnStmt(Value.bool(false))])),
            ])
          ),
        DiagnosticCode.S006_ReturnTypeMismatch,
        'Return type does not match function type'
      );
    });

    it('enterFunction 不修改外层上下文', () => {
      const outer = TestFactories.createContext();
      const inner = enterFunction(outer, VarType.Bool);
      assert.equal(outer.functionReturn, null);
      assert.equal(inner.functionReturn, VarType.Bool);
      assert.equal(inner.state, outer.state);
    });
  });

  describe('表达式语句', () => {
    it('语句位置的表达式照常检查并计数', () => {
      const state = check(Node.Stmt(Node.Expr(Node.AddExpr([Value.int(1), Value.int(2)]))));
      assert.equal(state.metrics.get('OP'), 1);
    });

    it('语句位置的非法表达式同样报错', () => {
      assertDiagnostic(
        () => check(Node.Stmt(Node.Expr(Node.AddExpr([Value.int(1), Value.bool(true)])))),
        DiagnosticCode.S002_InvalidExpressionType,
        'Invalid type in expression'
      );
    });
  });
});
