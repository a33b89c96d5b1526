// ExpositionParser fluent builder and built instance.
//
// Usage:
//   const parser = new ExpositionParser()
//     .help('attach')
//     .logger(pino({ level: 'debug' }))
//     .build();
//
//   const metrics = parser.parse(text);
//   const result = await parser.ingest(req);

import { pino, type Logger } from 'pino';
import type { HelpMode, Metric } from '../types/exposition.ts';
import { MetricAggregator } from './Aggregator.ts';
import { ExpositionParseError } from './errors.ts';
import { readLines } from './readLines.ts';
import { decodeBody, ingestRequest } from './Compat.ts';
import type { BodyOptions, IngestRequestLike, IngestResult } from './Compat.ts';

export type TryParseResult =
  | { ok: true; metrics: Metric[] }
  | { ok: false; error: ExpositionParseError };

export interface ParserConfig {
  help: HelpMode;
  logger: Logger;
}

/** ExpositionParser fluent builder. */
export class ExpositionParser {
  private _help: HelpMode = 'attach';
  private _logger?: Logger;

  /**
   * Choose what `# HELP` lines do.
   * - 'attach' (default): store the docstring on the named metric
   * - 'discard': recognize the line and drop it
   */
  help(mode: HelpMode): this {
    this._help = mode;
    return this;
  }

  /** Route parse diagnostics to a pino logger. Silent by default. */
  logger(logger: Logger): this {
    this._logger = logger;
    return this;
  }

  build(): BuiltExpositionParser {
    return new BuiltExpositionParser({
      help: this._help,
      logger: this._logger ?? pino({ level: 'silent' }),
    });
  }
}

/** A configured parser. Stateless between calls. */
export class BuiltExpositionParser {
  constructor(private readonly config: ParserConfig) {}

  /** Parse a whole exposition document. Throws ExpositionParseError on the first bad line. */
  parse(text: string): Metric[] {
    const { logger } = this.config;
    const aggregator = new MetricAggregator(this.config.help);
    let lines = 0;
    try {
      for (const { line } of readLines(text)) {
        lines++;
        if (line.kind === 'comment' && line.comment.kind === 'help' && line.comment.name === undefined) {
          logger.debug({ text: line.comment.text }, 'help line names no metric; ignored');
        }
        aggregator.add(line);
      }
    } catch (err) {
      if (err instanceof ExpositionParseError) {
        logger.warn({ line: err.line, column: err.column, rule: err.rule }, err.message);
      }
      throw err;
    }
    const metrics = aggregator.finalize();
    logger.debug({ bytes: Buffer.byteLength(text), lines, metrics: metrics.length }, 'parsed exposition text');
    return metrics;
  }

  /** Like parse(), but returns the parse error instead of throwing it. */
  tryParse(text: string): TryParseResult {
    try {
      return { ok: true, metrics: this.parse(text) };
    } catch (err) {
      if (err instanceof ExpositionParseError) return { ok: false, error: err };
      throw err;
    }
  }

  /** Parse a raw text/plain body, decoding UTF-8 bytes as needed. */
  parseBody(body: string | Uint8Array, options?: BodyOptions): Metric[] {
    return this.parse(decodeBody(body, options));
  }

  /**
   * Parse a fetch Request or request-like object.
   * Never throws for bad input; the outcome is carried in `status`.
   */
  ingest(req: Request | IngestRequestLike): Promise<IngestResult> {
    return ingestRequest(this, req);
  }

  get settings(): Readonly<Pick<ParserConfig, 'help'>> {
    return { help: this.config.help };
  }
}

const defaultParser = new ExpositionParser().build();

/** Parse with the default configuration. */
export function parseComplete(text: string): Metric[] {
  return defaultParser.parse(text);
}

export function tryParse(text: string): TryParseResult {
  return defaultParser.tryParse(text);
}
