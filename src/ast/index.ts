/**
 * @module ast
 *
 * AST（抽象语法树）模块。
 *
 * 包含：
 * - AST 节点构造器 (Node)
 * - 版本化 JSON 序列化 (serializeAst, deserializeAst)
 */

export { Node } from './ast.js';
export { serializeAst, deserializeAst, isValidAstJson } from './ast_json.js';
export type { AstEnvelope } from './ast_json.js';
