/**
 * PEG-style parser combinators
 *
 * Every parser lazily enumerates all the ways it can match at a position,
 * so a caller that needs the whole input consumed can keep asking for the
 * next alternative instead of committing to the first one.
 * Only `rule` produces tree nodes; every other combinator just forwards the
 * nodes of its parts.
 */

export interface ParseNode<R extends string = string> {
  readonly rule: R;
  /** The matched slice of the input, without surrounding whitespace */
  readonly text: string;
  readonly start: number;
  readonly end: number;
  readonly children: readonly ParseNode<R>[];
}

export interface Match<R extends string> {
  readonly end: number;
  readonly nodes: readonly ParseNode<R>[];
}

export type Parser<R extends string> = (input: string, position: number) => Iterable<Match<R>>;

const WHITESPACE_CHAR = /\s/;
const WORD_CHAR = /[a-z0-9]/;
const DIGIT_CHAR = /[0-9]/;

export function skipWhitespace(input: string, position: number): number {
  let cursor = position;
  while (cursor < input.length && WHITESPACE_CHAR.test(input.charAt(cursor))) {
    cursor++;
  }
  return cursor;
}

/**
 * Exact text
 */
export function literal<R extends string>(text: string): Parser<R> {
  return function* (input, position) {
    if (input.startsWith(text, position)) {
      yield { end: position + text.length, nodes: [] };
    }
  };
}

/**
 * Exact text that is not immediately followed by a letter or digit
 */
export function keyword<R extends string>(word: string): Parser<R> {
  return function* (input, position) {
    const end = position + word.length;
    if (input.startsWith(word, position) && !WORD_CHAR.test(input.charAt(end))) {
      yield { end, nodes: [] };
    }
  };
}

/**
 * Empty match at a word break: the characters on either side of the position
 * are not both letters or digits
 */
export function wordBreak<R extends string>(): Parser<R> {
  return function* (input, position) {
    if (!(WORD_CHAR.test(input.charAt(position - 1)) && WORD_CHAR.test(input.charAt(position)))) {
      yield { end: position, nodes: [] };
    }
  };
}

/**
 * A complete run of decimal digits whose length lies within [min, max]
 */
export function digits<R extends string>(min: number = 1, max: number = Number.POSITIVE_INFINITY): Parser<R> {
  return function* (input, position) {
    let end = position;
    while (end < input.length && DIGIT_CHAR.test(input.charAt(end))) {
      end++;
    }
    const length = end - position;
    if (length >= min && length <= max) {
      yield { end, nodes: [] };
    }
  };
}

function sequence<R extends string>(parts: readonly Parser<R>[], skipSpace: boolean): Parser<R> {
  function* step(input: string, index: number, position: number, nodes: readonly ParseNode<R>[]): Generator<Match<R>> {
    if (index >= parts.length) {
      yield { end: position, nodes };
      return;
    }

    const part = parts[index];
    const start = skipSpace && index > 0 ? skipWhitespace(input, position) : position;
    for (const match of part(input, start)) {
      // An empty match must not drag the skipped whitespace into the span
      const end = match.end === start ? position : match.end;
      yield* step(input, index + 1, end, [...nodes, ...match.nodes]);
    }
  }

  return (input, position) => step(input, 0, position, []);
}

/**
 * Parts in order, with optional whitespace between them
 */
export function seq<R extends string>(...parts: Parser<R>[]): Parser<R> {
  return sequence(parts, true);
}

/**
 * Parts in order with nothing between them
 */
export function adjacent<R extends string>(...parts: Parser<R>[]): Parser<R> {
  return sequence(parts, false);
}

/**
 * Ordered alternation: every match of the first alternative, then of the second, ...
 */
export function choice<R extends string>(...alternatives: Parser<R>[]): Parser<R> {
  return function* (input, position) {
    for (const alternative of alternatives) {
      yield* alternative(input, position);
    }
  };
}

export function optional<R extends string>(parser: Parser<R>): Parser<R> {
  return function* (input, position) {
    yield* parser(input, position);
    yield { end: position, nodes: [] };
  };
}

/**
 * Zero or more repetitions separated by optional whitespace, longest first
 */
export function many<R extends string>(parser: Parser<R>): Parser<R> {
  function* step(input: string, position: number, nodes: readonly ParseNode<R>[]): Generator<Match<R>> {
    const start = skipWhitespace(input, position);
    for (const match of parser(input, start)) {
      if (match.end === start) continue;
      yield* step(input, match.end, [...nodes, ...match.nodes]);
    }
    yield { end: position, nodes };
  }

  return (input, position) => step(input, position, []);
}

/**
 * Named rule: wraps whatever the inner parser matched into a single node
 */
export function rule<R extends string>(name: R, parser: Parser<R>): Parser<R> {
  return function* (input, position) {
    for (const match of parser(input, position)) {
      yield {
        end: match.end,
        nodes: [{
          rule: name,
          text: input.slice(position, match.end),
          start: position,
          end: match.end,
          children: match.nodes
        }]
      };
    }
  };
}

/**
 * Defers construction so rules can refer to themselves
 */
export function lazy<R extends string>(factory: () => Parser<R>): Parser<R> {
  let resolved: Parser<R> | undefined;
  return (input, position) => {
    resolved ??= factory();
    return resolved(input, position);
  };
}

/**
 * First match of `parser` that covers the whole input, surrounding whitespace aside
 */
export function matchEntire<R extends string>(parser: Parser<R>, input: string): ParseNode<R> | null {
  const start = skipWhitespace(input, 0);
  for (const match of parser(input, start)) {
    if (match.nodes.length === 1 && skipWhitespace(input, match.end) === input.length) {
      return match.nodes[0];
    }
  }
  return null;
}
