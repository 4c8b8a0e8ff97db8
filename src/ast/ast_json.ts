import { readFileSync } from 'node:fs';
import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import type { Program } from '../types.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';

/**
 * AST JSON 序列化封装（版本化）
 *
 * 解析得到的 Program 可以写成带版本号的 JSON，交给下游阶段或其他进程读取；
 * 读取时先检查版本，再用 ast.schema.json 做结构校验。
 */

/**
 * AST JSON 封装接口
 * 包含版本信息和可选元数据
 */
export interface AstEnvelope {
  /** JSON schema 版本 */
  version: '1.0';
  /** 顶层语句序列 */
  program: Program;
  /** 可选元数据 */
  metadata?: {
    /** 生成时间（ISO 8601 格式） */
    generatedAt?: string;
    /** 源文件路径或描述 */
    source?: string;
    /** 编译器版本 */
    compilerVersion?: string;
  };
}

const schema: SchemaObject = JSON.parse(
  readFileSync(new URL('./ast.schema.json', import.meta.url), 'utf-8')
);

const ajv = new Ajv({ strict: true, allErrors: true });
const validateEnvelope: ValidateFunction<AstEnvelope> = ajv.compile<AstEnvelope>(schema);

function pathDepth(error: ErrorObject): number {
  return error.instancePath === '' ? 0 : error.instancePath.split('/').length;
}

/**
 * oneOf 的每个分支都会报错；取位置最深的一条（同深度取最先出现的），
 * 它最接近真正出错的字段
 */
function describeSchemaError(errors: readonly ErrorObject[] | null | undefined): string {
  const deepest = (errors ?? []).reduce<ErrorObject | undefined>(
    (best, error) => (best === undefined || pathDepth(error) > pathDepth(best) ? error : best),
    undefined
  );
  if (deepest === undefined) return 'does not match the AST schema';
  const path = deepest.instancePath === '' ? '/' : deepest.instancePath;
  return `${path} ${deepest.message ?? 'is invalid'}`;
}

/**
 * 将 Program 序列化为 JSON 字符串
 *
 * @param metadata - 可选元数据
 * @returns 格式化的 JSON 字符串（2 空格缩进）
 *
 * @example
 * ```typescript
 * const { ast } = parse('let x = 1;');
 * if (ast) writeFileSync('main.ast.json', serializeAst(ast, { source: 'main.brook' }));
 * ```
 */
export function serializeAst(program: Program, metadata?: AstEnvelope['metadata']): string {
  const envelope: AstEnvelope = {
    version: '1.0',
    program,
    ...(metadata ? { metadata } : {}),
  };
  return JSON.stringify(envelope, null, 2);
}

/**
 * 从 JSON 字符串反序列化为 Program
 *
 * @throws {DiagnosticError} A001：JSON 无法解析或不符合 schema；A002：版本不受支持
 */
export function deserializeAst(json: string): Program {
  let envelope: unknown;

  try {
    envelope = JSON.parse(json);
  } catch (e) {
    return Diagnostics.invalidAstJson(
      `malformed JSON (${e instanceof Error ? e.message : String(e)})`
    ).throw();
  }

  // 类型检查：确保是对象（非数组）
  if (envelope === null || typeof envelope !== 'object' || Array.isArray(envelope)) {
    return Diagnostics.invalidAstJson('expected object').throw();
  }

  // 版本检查先于结构校验，旧版本给出更明确的错误
  const version = 'version' in envelope ? envelope.version : undefined;
  if (version !== '1.0') {
    return Diagnostics.unsupportedAstVersion(
      version === undefined ? 'missing' : String(version)
    ).throw();
  }

  if (!validateEnvelope(envelope)) {
    return Diagnostics.invalidAstJson(describeSchemaError(validateEnvelope.errors)).throw();
  }

  return envelope.program;
}

/**
 * 验证 JSON 字符串是否为有效的 AST 格式
 */
export function isValidAstJson(json: string): boolean {
  try {
    deserializeAst(json);
    return true;
  } catch {
    return false;
  }
}
