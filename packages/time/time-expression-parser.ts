/**
 * Time Expression Parser using Chevrotain
 *
 * Parses the free-form time range language accepted in TimeRange.expression:
 *
 *   inf                               all time
 *   7D                                the 7 days ending at the reference time
 *   now-1W/D to now/D                 explicit start and end points
 *   3M as of latest/M                 reference time taken from the data
 *   7D tz America/New_York            calendar arithmetic in another zone
 *
 * A point is an anchor (now, latest, earliest, watermark) followed by signed
 * offsets and an optional /<unit> truncation. Units are case sensitive:
 * Y Q M W D for calendar units, h m s for clock units.
 */

import { createToken, Lexer, CstParser, type CstNode, type CstElement, type IToken } from 'chevrotain';
import type { CalendarConventions, TimeGrain } from './grain.js';
import { addUnits, truncateTime, type CalendarUnit } from './zoned.js';

// ---
// TOKEN DEFINITIONS
// ---

// Word boundary helpers - zone names may continue with a slash, anchors take /<unit>
const WB = '(?![a-zA-Z0-9_/])';
const ANCHOR_WB = '(?![a-zA-Z0-9_])';

const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /\s+/, group: Lexer.SKIPPED });

const Inf = createToken({ name: 'Inf', pattern: new RegExp(`inf${WB}`, 'i') });
const To = createToken({ name: 'To', pattern: new RegExp(`to${WB}`, 'i') });
const As = createToken({ name: 'As', pattern: new RegExp(`as${WB}`, 'i') });
const Of = createToken({ name: 'Of', pattern: new RegExp(`of${WB}`, 'i') });
const Tz = createToken({ name: 'Tz', pattern: new RegExp(`tz${WB}`, 'i') });

// Anchors
const Now = createToken({ name: 'Now', pattern: new RegExp(`now${ANCHOR_WB}`, 'i') });
const Latest = createToken({ name: 'Latest', pattern: new RegExp(`latest${ANCHOR_WB}`, 'i') });
const Earliest = createToken({ name: 'Earliest', pattern: new RegExp(`earliest${ANCHOR_WB}`, 'i') });
const Watermark = createToken({ name: 'Watermark', pattern: new RegExp(`watermark${ANCHOR_WB}`, 'i') });

// 7D, 15m, 1Y - amount with unit
const Span = createToken({ name: 'Span', pattern: /\d+[YQMWDhms](?![a-zA-Z0-9_])/ });
// bare unit after a slash
const Unit = createToken({ name: 'Unit', pattern: /[YQMWDhms](?![a-zA-Z0-9_/])/ });
// IANA zone names: UTC, Europe/Berlin, Etc/GMT+5
const ZoneName = createToken({
  name: 'ZoneName',
  pattern: /[A-Za-z_][A-Za-z0-9_+-]*(?:\/[A-Za-z0-9_+-]+)*/,
});

const Plus = createToken({ name: 'Plus', pattern: /\+/ });
const Minus = createToken({ name: 'Minus', pattern: /-/ });
const Slash = createToken({ name: 'Slash', pattern: /\// });

// Token order matters! Keywords before ZoneName, Span before Unit
const allTokens = [
  WhiteSpace,
  Inf,
  To,
  As,
  Of,
  Tz,
  Now,
  Latest,
  Earliest,
  Watermark,
  Span,
  Unit,
  ZoneName,
  Plus,
  Minus,
  Slash,
];

const TimeExpressionLexer = new Lexer(allTokens);

// ---
// PARSER
// ---

class TimeExpressionParser extends CstParser {
  constructor() {
    super(allTokens);
    this.performSelfAnalysis();
  }

  // Main entry point
  public timeExpression = this.RULE('timeExpression', () => {
    this.SUBRULE(this.range);
    this.OPTION(() => {
      this.CONSUME(As);
      this.CONSUME(Of);
      this.SUBRULE(this.point, { LABEL: 'asOf' });
    });
    this.OPTION2(() => {
      this.CONSUME(Tz);
      this.CONSUME(ZoneName);
    });
  });

  private range = this.RULE('range', () => {
    this.OR([
      { ALT: () => this.CONSUME(Inf) },
      { ALT: () => this.CONSUME(Span) },
      {
        ALT: () => {
          this.SUBRULE(this.point, { LABEL: 'from' });
          this.CONSUME(To);
          this.SUBRULE2(this.point, { LABEL: 'to' });
        },
      },
    ]);
  });

  private point = this.RULE('point', () => {
    this.SUBRULE(this.anchor);
    this.MANY(() => {
      this.SUBRULE(this.offset, { LABEL: 'offsets' });
    });
    this.OPTION(() => {
      this.CONSUME(Slash);
      this.CONSUME(Unit, { LABEL: 'truncation' });
    });
  });

  private anchor = this.RULE('anchor', () => {
    this.OR([
      { ALT: () => this.CONSUME(Now) },
      { ALT: () => this.CONSUME(Latest) },
      { ALT: () => this.CONSUME(Earliest) },
      { ALT: () => this.CONSUME(Watermark) },
    ]);
  });

  private offset = this.RULE('offset', () => {
    this.OR([
      { ALT: () => this.CONSUME(Plus, { LABEL: 'sign' }) },
      { ALT: () => this.CONSUME(Minus, { LABEL: 'sign' }) },
    ]);
    this.CONSUME(Span);
  });
}

const parserInstance = new TimeExpressionParser();

// ---
// AST
// ---

export type AnchorName = 'now' | 'latest' | 'earliest' | 'watermark';

export interface TimeOffset {
  /** signed amount */
  amount: number;
  unit: CalendarUnit;
}

export interface TimePoint {
  anchor: AnchorName;
  offsets: TimeOffset[];
  truncate?: TimeGrain;
}

export type TimeExpression =
  | { type: 'all'; asOf?: TimePoint; timeZone?: string }
  | { type: 'span'; span: TimeOffset; asOf?: TimePoint; timeZone?: string }
  | { type: 'range'; from: TimePoint; to: TimePoint; asOf?: TimePoint; timeZone?: string };

export class TimeExpressionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeExpressionError';
  }
}

const UNITS: Record<string, CalendarUnit> = {
  Y: 'year',
  Q: 'quarter',
  M: 'month',
  W: 'week',
  D: 'day',
  h: 'hour',
  m: 'minute',
  s: 'second',
};

// ---
// CST → AST
// ---

function isToken(element: CstElement): element is IToken {
  return 'image' in element;
}

function tokensOf(node: CstNode, key: string): IToken[] {
  return (node.children[key] ?? []).filter(isToken);
}

function nodesOf(node: CstNode, key: string): CstNode[] {
  return (node.children[key] ?? []).filter((el): el is CstNode => !isToken(el));
}

function firstNode(node: CstNode, key: string): CstNode {
  const [child] = nodesOf(node, key);
  if (!child) {
    throw new TimeExpressionError(`Malformed time expression: missing ${key}`);
  }
  return child;
}

function toUnit(symbol: string): CalendarUnit {
  const unit = UNITS[symbol];
  if (!unit) {
    throw new TimeExpressionError(`Unknown time unit '${symbol}'`);
  }
  return unit;
}

function toSpan(image: string, sign: 1 | -1 = 1): TimeOffset {
  return {
    amount: sign * parseInt(image.slice(0, -1), 10),
    unit: toUnit(image.slice(-1)),
  };
}

function toAnchor(node: CstNode): AnchorName {
  if (tokensOf(node, 'Latest').length > 0) return 'latest';
  if (tokensOf(node, 'Earliest').length > 0) return 'earliest';
  if (tokensOf(node, 'Watermark').length > 0) return 'watermark';
  return 'now';
}

function toPoint(node: CstNode): TimePoint {
  const offsets = nodesOf(node, 'offsets').map(offsetNode => {
    const [sign] = tokensOf(offsetNode, 'sign');
    const [span] = tokensOf(offsetNode, 'Span');
    return toSpan(span.image, sign.image === '-' ? -1 : 1);
  });

  const point: TimePoint = { anchor: toAnchor(firstNode(node, 'anchor')), offsets };
  const [truncation] = tokensOf(node, 'truncation');
  if (truncation) {
    point.truncate = toUnit(truncation.image);
  }
  return point;
}

function toTimeExpression(cst: CstNode): TimeExpression {
  const range = firstNode(cst, 'range');
  const [asOfNode] = nodesOf(cst, 'asOf');
  const [zone] = tokensOf(cst, 'ZoneName');
  const modifiers = {
    ...(asOfNode ? { asOf: toPoint(asOfNode) } : {}),
    ...(zone ? { timeZone: zone.image } : {}),
  };

  if (tokensOf(range, 'Inf').length > 0) {
    return { type: 'all', ...modifiers };
  }
  const [span] = tokensOf(range, 'Span');
  if (span) {
    return { type: 'span', span: toSpan(span.image), ...modifiers };
  }
  return {
    type: 'range',
    from: toPoint(firstNode(range, 'from')),
    to: toPoint(firstNode(range, 'to')),
    ...modifiers,
  };
}

// ---
// PUBLIC API
// ---

/**
 * Parse a time range expression
 */
export function parseTimeExpression(input: string): TimeExpression {
  const lexResult = TimeExpressionLexer.tokenize(input);
  if (lexResult.errors.length > 0) {
    throw new TimeExpressionError(
      `Invalid time expression '${input}': ${lexResult.errors.map(e => e.message).join(', ')}`
    );
  }

  parserInstance.input = lexResult.tokens;
  const cst = parserInstance.timeExpression();

  if (parserInstance.errors.length > 0) {
    throw new TimeExpressionError(
      `Invalid time expression '${input}': ${parserInstance.errors.map(e => e.message).join(', ')}`
    );
  }

  return toTimeExpression(cst);
}

/**
 * Instants the anchors of an expression resolve to. `now` is the execution
 * time; the others come from the data and may be unknown.
 */
export interface TimeAnchors {
  now: Date;
  earliest?: Date;
  latest?: Date;
  watermark?: Date;
}

export interface EvaluatedTimeRange {
  start?: Date;
  end?: Date;
  timeZone: string;
}

function resolveAnchor(anchor: AnchorName, anchors: TimeAnchors, reference: Date): Date {
  switch (anchor) {
    case 'now':
      return reference;
    case 'earliest':
      if (!anchors.earliest) {
        throw new TimeExpressionError("Anchor 'earliest' is not available for this metrics view");
      }
      return anchors.earliest;
    case 'latest':
      if (!anchors.latest) {
        throw new TimeExpressionError("Anchor 'latest' is not available for this metrics view");
      }
      return anchors.latest;
    case 'watermark': {
      const watermark = anchors.watermark ?? anchors.latest;
      if (!watermark) {
        throw new TimeExpressionError("Anchor 'watermark' is not available for this metrics view");
      }
      return watermark;
    }
  }
}

function evaluatePoint(
  point: TimePoint,
  anchors: TimeAnchors,
  reference: Date,
  calendar: CalendarConventions
): Date {
  let result = resolveAnchor(point.anchor, anchors, reference);
  for (const offset of point.offsets) {
    result = addUnits(result, offset.amount, offset.unit, calendar.timeZone);
  }
  if (point.truncate) {
    result = truncateTime(result, point.truncate, calendar);
  }
  return result;
}

/**
 * Evaluate a parsed expression to an absolute [start, end) range.
 * `as of` replaces the reference time that `now` and shorthand spans use.
 */
export function evaluateTimeExpression(
  expression: TimeExpression,
  anchors: TimeAnchors,
  calendar: CalendarConventions
): EvaluatedTimeRange {
  const effective: CalendarConventions = {
    ...calendar,
    timeZone: expression.timeZone ?? calendar.timeZone,
  };
  const reference = expression.asOf
    ? evaluatePoint(expression.asOf, anchors, anchors.now, effective)
    : anchors.now;

  switch (expression.type) {
    case 'all':
      return { timeZone: effective.timeZone };
    case 'span':
      return {
        start: addUnits(reference, -expression.span.amount, expression.span.unit, effective.timeZone),
        end: reference,
        timeZone: effective.timeZone,
      };
    case 'range':
      return {
        start: evaluatePoint(expression.from, anchors, reference, effective),
        end: evaluatePoint(expression.to, anchors, reference, effective),
        timeZone: effective.timeZone,
      };
  }
}
