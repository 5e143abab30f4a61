import type { AstNode, Span } from '../types.js';
import { VarType } from '../types.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';

export const ORDERING_OPERATORS: ReadonlySet<string> = new Set(['<', '>', '<=', '>=']);
export const EQUALITY_OPERATORS: ReadonlySet<string> = new Set(['==', '!=']);

// 只有 num 与 bool 命中，原型成员名（constructor、toString）不算关键字
const TYPE_KEYWORDS: ReadonlyMap<string, VarType> = new Map([
  ['num', VarType.Number],
  ['bool', VarType.Bool],
]);

export function parseTypeKeyword(keyword: string | undefined, span?: Span): VarType {
  const type = keyword !== undefined ? TYPE_KEYWORDS.get(keyword) : undefined;
  if (type === undefined) {
    return Diagnostics.malformedTree(`unknown type keyword '${keyword ?? ''}'`, span).throw();
  }
  return type;
}

export function childAt(node: AstNode, index: number): AstNode {
  const child = node.children[index];
  if (!child) {
    return Diagnostics.malformedTree(`${node.kind} is missing child ${index}`, node.span).throw();
  }
  return child;
}

export function valueOf(node: AstNode): string {
  if (node.value === undefined) {
    return Diagnostics.malformedTree(`${node.kind} has no value`, node.span).throw();
  }
  return node.value;
}

/** 赋值目标与声明中的标识符只取名字，不做符号表读取 */
export function identifierName(node: AstNode): string {
  if (node.kind !== 'Identifier') {
    return Diagnostics.malformedTree(`expected Identifier, found ${node.kind}`, node.span).throw();
  }
  return valueOf(node);
}

export function formatType(type: VarType): string {
  return type === VarType.Number ? 'num' : 'bool';
}
