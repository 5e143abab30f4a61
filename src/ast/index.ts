/**
 * @module ast
 *
 * AST（抽象语法树）模块。
 *
 * 包含：
 * - AST 节点构造器 (Node, Value)
 * - AST 访问者模式 (AstVisitor, DefaultAstVisitor)
 * - AST JSON 封装的读写 (parseAstJson, loadAstFile, serializeAst)
 */

export { Node, Value } from './ast.js';
export { DefaultAstVisitor } from './ast_visitor.js';
export type { AstVisitor } from './ast_visitor.js';
export { parseAstJson, loadAstFile, serializeAst, AST_JSON_VERSION, type AstEnvelope } from './ast_json.js';
