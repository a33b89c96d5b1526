// promtext — Prometheus text exposition format parser

// Core builder
export { ExpositionParser, BuiltExpositionParser, parseComplete, tryParse } from './src/core/ExpositionParser.ts';
export type { ParserConfig, TryParseResult } from './src/core/ExpositionParser.ts';

// Errors
export { ExpositionParseError } from './src/core/errors.ts';

// Request / body adapters
export { decodeBody, ingestRequest, isTextContentType, UnsupportedContentTypeError } from './src/core/Compat.ts';
export type { BodyOptions, CompatHeaders, IngestRequestLike, IngestResult, TextParser } from './src/core/Compat.ts';

// Types
export { METRIC_TYPES } from './src/types/exposition.ts';
export type { Metric, MetricType, Sample, Labels, HelpMode } from './src/types/exposition.ts';

// Aggregation and line reading (for advanced use)
export { MetricAggregator, finalizeMetrics } from './src/core/Aggregator.ts';
export { readLines } from './src/core/readLines.ts';
export type { ClassifiedLine } from './src/core/readLines.ts';

// Grammar recognizers (for advanced use)
export { tokenParser, isValidToken } from './src/grammar/token.ts';
export { valueParser, timestampParser, parseFloatLiteral } from './src/grammar/value.ts';
export { labelsParser, labelValueParser } from './src/grammar/labels.ts';
export { sampleParser } from './src/grammar/sample.ts';
export type { SampleEntry } from './src/grammar/sample.ts';
export { commentParser, typeParser, helpParser, otherCommentParser } from './src/grammar/comment.ts';
export type { CommentLine } from './src/grammar/comment.ts';
export { lineParser, emptyLineParser } from './src/grammar/line.ts';
export type { LineType } from './src/grammar/line.ts';
export type { ParseResult, GrammarRule, Recognizer } from './src/grammar/result.ts';
