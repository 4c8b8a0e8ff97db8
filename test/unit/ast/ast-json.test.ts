import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { deserializeAst, isValidAstJson, serializeAst } from '../../../src/ast/ast_json.js';
import { parse, parseOrThrow } from '../../../src/parser.js';
import { DiagnosticCode, DiagnosticError } from '../../../src/diagnostics/diagnostics.js';

const SOURCE = [
  'fn fib(n) {',
  '  if n < 2 { return n; } else if n == 2 { return 1; }',
  '  let a = fib(n - 1);',
  '  const b = fib(n - 2);',
  '  return a + b;',
  '}',
  'loop { x = !done && "s\\n"; continue; }',
  'while null { break; }',
].join('\n');

function isDiagnostic(code: DiagnosticCode, message?: string) {
  return (error: unknown): boolean =>
    error instanceof DiagnosticError &&
    error.diagnostic.code === code &&
    (message === undefined || error.message === message);
}

describe('AST JSON 序列化', () => {
  it('应该生成带版本号的 2 空格缩进 JSON', () => {
    const program = parseOrThrow('break;');
    const json = serializeAst(program);

    assert.ok(json.startsWith('{\n  "version": "1.0",\n  "program": {\n    "kind": "Program",'));
    assert.deepEqual(JSON.parse(json), { version: '1.0', program });
  });

  it('应该只在提供时写入元数据', () => {
    const program = parseOrThrow('');
    const metadata = { source: 'main.brook', compilerVersion: '0.1.0' };

    assert.deepEqual(JSON.parse(serializeAst(program, metadata)).metadata, metadata);
    assert.equal('metadata' in JSON.parse(serializeAst(program)), false);
  });

  it('反序列化应该还原相同的 AST', () => {
    const program = parseOrThrow(SOURCE);
    assert.deepEqual(deserializeAst(serializeAst(program, { source: 'fib.brook' })), program);
  });
});

describe('数字字面量的往返', () => {
  it('超出双精度范围的数字不应该产生 AST', () => {
    const outcome = parse('x = ' + '9'.repeat(400) + ';');
    assert.equal(outcome.ast, null);
    assert.equal(outcome.diagnostics.length, 1);
    assert.equal(outcome.diagnostics[0]?.code, DiagnosticCode.P003_ExpectedToken);
    assert.equal(
      outcome.diagnostics[0]?.message,
      'program: expression_statement: expression: expected finite number'
    );
    assert.equal(outcome.diagnostics[0]?.span.start.offset, 4);
  });

  it('接近上限的大数应该原样往返', () => {
    const program = parseOrThrow('x = ' + '9'.repeat(300) + '; y = 0.000001;');
    const restored = deserializeAst(serializeAst(program));
    assert.deepEqual(restored, program);
  });
});

describe('AST JSON 反序列化', () => {
  it('JSON 语法错误应该报告 A001', () => {
    assert.throws(() => deserializeAst('{ "version": '), isDiagnostic(DiagnosticCode.A001_InvalidAstJson));
  });

  it('非对象应该报告 A001', () => {
    assert.throws(
      () => deserializeAst('[]'),
      isDiagnostic(DiagnosticCode.A001_InvalidAstJson, 'Invalid AST JSON: expected object')
    );
    assert.throws(() => deserializeAst('null'), isDiagnostic(DiagnosticCode.A001_InvalidAstJson));
  });

  it('版本不受支持时应该报告 A002', () => {
    assert.throws(
      () => deserializeAst('{"version":"2.0","program":{}}'),
      isDiagnostic(DiagnosticCode.A002_UnsupportedAstVersion, 'Unsupported AST JSON version: 2.0')
    );
    assert.throws(
      () => deserializeAst('{"program":{}}'),
      isDiagnostic(DiagnosticCode.A002_UnsupportedAstVersion, 'Unsupported AST JSON version: missing')
    );
    assert.throws(
      () => deserializeAst('{"version":1}'),
      isDiagnostic(DiagnosticCode.A002_UnsupportedAstVersion, 'Unsupported AST JSON version: 1')
    );
  });

  it('不符合 schema 的节点应该报告 A001', () => {
    const envelope = JSON.parse(serializeAst(parseOrThrow('continue;')));
    envelope.program.statements[0].kind = 'Skip';

    assert.throws(
      () => deserializeAst(JSON.stringify(envelope)),
      isDiagnostic(
        DiagnosticCode.A001_InvalidAstJson,
        'Invalid AST JSON: /program/statements/0/kind must be equal to constant'
      )
    );
  });

  it('应该报告最深处的 schema 错误', () => {
    const envelope = JSON.parse(serializeAst(parseOrThrow('1;')));
    envelope.program.statements[0].expression.value = null;

    assert.throws(
      () => deserializeAst(JSON.stringify(envelope)),
      isDiagnostic(
        DiagnosticCode.A001_InvalidAstJson,
        'Invalid AST JSON: /program/statements/0/expression/value must be number'
      )
    );
  });

  it('缺少区间或多余字段应该报告 A001', () => {
    const missingSpan = JSON.stringify({
      version: '1.0',
      program: { kind: 'Program', statements: [] },
    });
    assert.throws(() => deserializeAst(missingSpan), isDiagnostic(DiagnosticCode.A001_InvalidAstJson));

    const extra = JSON.parse(serializeAst(parseOrThrow('')));
    extra.comment = 'hand edited';
    assert.throws(
      () => deserializeAst(JSON.stringify(extra)),
      isDiagnostic(DiagnosticCode.A001_InvalidAstJson)
    );
  });
});

describe('isValidAstJson', () => {
  it('应该区分有效与无效输入', () => {
    assert.equal(isValidAstJson(serializeAst(parseOrThrow(SOURCE))), true);
    assert.equal(isValidAstJson('{}'), false);
    assert.equal(isValidAstJson('not json'), false);
  });
});
