import { ConfigurationError } from '../lib/error.js';

/**
 * One element of a parsed launch line.
 */
export interface ElementSpec {
  factory: string;
  properties: Map<string, string>;
}

/**
 * Linked run of elements (`a ! b ! c`).
 */
export type ChainSpec = ElementSpec[];

const CAPS_RE = /^[a-z]+\/[\w.+-]+(,|$)/i;
const PROPERTY_RE = /^([\w-]+)=(.*)$/s;
const FACTORY_RE = /^[a-z][\w-]*$/i;

type Token = { kind: 'link' } | { kind: 'word'; text: string };

function tokenize(description: string): Token[] {
  const tokens: Token[] = [];
  let word = '';
  let quote: string | null = null;

  const flush = () => {
    if (word.length > 0) {
      tokens.push({ kind: 'word', text: word });
      word = '';
    }
  };

  for (const char of description) {
    if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        word += char;
      }
    } else if (char === '"' || char === "'") {
      quote = char;
    } else if (char === '!') {
      flush();
      tokens.push({ kind: 'link' });
    } else if (/\s/.test(char)) {
      flush();
    } else {
      word += char;
    }
  }

  if (quote) {
    throw new ConfigurationError(`Unterminated quote in description '${description}'`);
  }
  flush();
  return tokens;
}

/**
 * Parse a launch line into chains of element specs.
 *
 * Elements are linked with `!`. `key=value` words set properties on the
 * preceding element, a bare caps string becomes a `capsfilter`, and an
 * element that does not follow a `!` starts a new chain.
 *
 * @param description - Launch line
 *
 * @returns Parsed chains
 *
 * @throws {ConfigurationError} If the line is empty or malformed
 *
 * @example
 * ```typescript
 * parseLaunchLine('videotestsrc num-buffers=10 ! video/x-raw,format=GRAY8 ! appsink');
 * // [[videotestsrc {num-buffers: '10'}, capsfilter {caps: 'video/x-raw,format=GRAY8'}, appsink {}]]
 * ```
 */
export function parseLaunchLine(description: string): ChainSpec[] {
  const chains: ChainSpec[] = [];
  let current: ElementSpec | null = null;
  let linkPending = false;

  for (const token of tokenize(description)) {
    if (token.kind === 'link') {
      if (!current || linkPending) {
        throw new ConfigurationError(`Unexpected '!' in description '${description}'`);
      }
      linkPending = true;
      continue;
    }

    const { text } = token;
    let element: ElementSpec;
    if (CAPS_RE.test(text)) {
      element = { factory: 'capsfilter', properties: new Map([['caps', text]]) };
    } else {
      const property = PROPERTY_RE.exec(text);
      if (property) {
        if (!current || linkPending) {
          throw new ConfigurationError(`Property '${text}' does not follow an element`);
        }
        current.properties.set(property[1], property[2]);
        continue;
      }
      if (!FACTORY_RE.test(text)) {
        throw new ConfigurationError(`Invalid element '${text}' in description '${description}'`);
      }
      element = { factory: text, properties: new Map() };
    }

    if (linkPending) {
      chains[chains.length - 1].push(element);
      linkPending = false;
    } else {
      chains.push([element]);
    }
    current = element;
  }

  if (linkPending) {
    throw new ConfigurationError(`Description '${description}' ends with '!'`);
  }
  if (chains.length === 0) {
    throw new ConfigurationError('Empty graph description');
  }
  return chains;
}
