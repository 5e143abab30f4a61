/**
 * AST JSON 封装（版本化）
 *
 * 外部解析器以 JSON 形式交付语法树：`{ version, program, metadata? }`。
 * 读取时先用 ajv 按 ast.schema.json 校验结构，再转换为只读 AstNode。
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import type { AstNode, NodeKind, Span } from '../types.js';
import { Diagnostics, type Diagnostic } from '../diagnostics/diagnostics.js';
import { Node } from './ast.js';

export const AST_JSON_VERSION = '1.0';

interface AstNodeJson {
  kind: NodeKind;
  value?: string;
  ops?: string[];
  children?: AstNodeJson[];
  span?: Span;
}

export interface AstEnvelope {
  version: string;
  program: AstNodeJson;
  metadata?: {
    /** 生成时间（ISO 8601 格式） */
    generatedAt?: string;
    /** 源文件路径或描述 */
    source?: string;
    /** 产出该树的解析器名称与版本 */
    parser?: string;
  };
}

// 源码运行时 schema 位于 src/ast 上两级；编译产物位于 dist/src/ast，需要再上一级
const here = dirname(fileURLToPath(import.meta.url));
const schemaPath = [join(here, '..', '..', 'ast.schema.json'), join(here, '..', '..', '..', 'ast.schema.json')].find(
  candidate => existsSync(candidate)
);
if (!schemaPath) {
  throw new Error(`ast.schema.json not found near ${here}`);
}
const schema: SchemaObject = JSON.parse(readFileSync(schemaPath, 'utf-8'));

const ajv = new Ajv({ strict: true, allErrors: true });
const validateEnvelope: ValidateFunction<AstEnvelope> = ajv.compile<AstEnvelope>(schema);

function describeAjvError(error: ErrorObject): string {
  const path = error.instancePath === '' ? '/' : error.instancePath;
  return `${path} ${error.message ?? 'is invalid'}`;
}

function toAstNode(json: AstNodeJson): AstNode {
  return Node.Raw(json.kind, (json.children ?? []).map(toAstNode), {
    ...(json.value !== undefined ? { value: json.value } : {}),
    ...(json.ops !== undefined ? { ops: json.ops } : {}),
    ...(json.span !== undefined ? { span: json.span } : {}),
  });
}

/**
 * 解析 AST JSON 文本。
 *
 * @returns 根节点（必为 Program），或诊断数组
 */
export function parseAstJson(text: string): AstNode | Diagnostic[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err: unknown) {
    const detail = err instanceof Error ? err.message : String(err);
    return [Diagnostics.invalidAstJson(detail).build()];
  }

  if (!validateEnvelope(data)) {
    const errors = validateEnvelope.errors ?? [];
    return errors.length > 0
      ? errors.map(error => Diagnostics.invalidAstJson(describeAjvError(error)).build())
      : [Diagnostics.invalidAstJson('schema validation failed').build()];
  }

  if (data.version !== AST_JSON_VERSION) {
    return [Diagnostics.unsupportedVersion(data.version).build()];
  }
  if (data.program.kind !== 'Program') {
    return [Diagnostics.invalidAstJson(`root node must be Program, found ${data.program.kind}`).build()];
  }
  return toAstNode(data.program);
}

export function loadAstFile(filePath: string): AstNode | Diagnostic[] {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return [Diagnostics.astFileNotFound(filePath).build()];
    }
    throw err;
  }
  return parseAstJson(content);
}

function toJson(node: AstNode): AstNodeJson {
  return {
    kind: node.kind,
    ...(node.value !== undefined ? { value: node.value } : {}),
    ...(node.ops !== undefined ? { ops: [...node.ops] } : {}),
    ...(node.children.length > 0 ? { children: node.children.map(toJson) } : {}),
    ...(node.span !== undefined ? { span: node.span } : {}),
  };
}

/**
 * 将语法树序列化为 JSON 字符串（2 空格缩进）
 *
 * @example
 * ```typescript
 * const json = serializeAst(program, { source: 'loop.mini' });
 * ```
 */
export function serializeAst(program: AstNode, metadata?: AstEnvelope['metadata']): string {
  const envelope: AstEnvelope = {
    version: AST_JSON_VERSION,
    program: toJson(program),
    ...(metadata ? { metadata } : {}),
  };
  return JSON.stringify(envelope, null, 2);
}
