import { DiagnosticBuilder, DiagnosticCode, type Diagnostic } from '../diagnostics/diagnostics.js';
import type { SourceText } from './cursor.js';
import { describeFailure, type FailureCause, type ParseFailure } from './failure.js';
import { pointSpan } from './span-utils.js';

const WORD_START = /^[A-Za-z_]/;

/** 关键字与标点都是 ExpectedLiteral；以字母开头的视为关键字 */
function isKeywordLiteral(literal: string): boolean {
  return WORD_START.test(literal);
}

function codeFor(cause: FailureCause): DiagnosticCode {
  switch (cause.kind) {
    case 'ExpectedLiteral':
      return isKeywordLiteral(cause.literal)
        ? DiagnosticCode.P004_ExpectedKeyword
        : DiagnosticCode.P006_ExpectedPunctuation;
    case 'ExpectedToken':
      if (cause.description === 'identifier') return DiagnosticCode.P001_ExpectedIdentifier;
      if (cause.description === 'expression') return DiagnosticCode.P007_ExpectedExpression;
      return DiagnosticCode.P003_ExpectedToken;
    case 'UnexpectedEndOfInput':
      return DiagnosticCode.P012_UnexpectedEndOfInput;
    case 'UnterminatedBlock':
      return DiagnosticCode.P015_UnterminatedBlock;
    case 'AllAlternativesFailed':
      return DiagnosticCode.P016_NoViableAlternative;
  }
}

/**
 * 将解析失败转换为诊断
 *
 * 消息为面包屑轨迹；每个上下文帧（由内向外）成为一条相关信息，指向该产生式的起点。
 * 缺少标点时附带一条插入该标点的修复建议。
 */
export function failureToDiagnostic(failure: ParseFailure, source: SourceText): Diagnostic {
  const { cause } = failure;
  const pos = source.positionAt(failure.offset);
  const builder = DiagnosticBuilder.error(codeFor(cause))
    .withMessage(describeFailure(failure))
    .withPosition(pos);

  if (cause.kind === 'ExpectedLiteral' && !isKeywordLiteral(cause.literal)) {
    builder.withFixIt(`Add '${cause.literal}'`, pointSpan(pos), cause.literal);
  }
  for (const frame of failure.frames) {
    builder.withRelated(pointSpan(source.positionAt(frame.offset)), `while parsing ${frame.label}`);
  }
  return builder.build();
}
