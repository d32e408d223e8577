/**
 * Reader for Valve's text KeyValues format (libraryfolders.vdf, appmanifest_*.acf)
 */

export type VdfValue = string | VdfObject;

export interface VdfObject {
  [key: string]: VdfValue;
}

type Token = { type: 'open' } | { type: 'close' } | { type: 'string'; value: string };

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', '\\': '\\', '"': '"' };

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (/\s/.test(ch)) {
      i++;
    } else if (ch === '/' && text[i + 1] === '/') {
      while (i < text.length && text[i] !== '\n') i++;
    } else if (ch === '{') {
      tokens.push({ type: 'open' });
      i++;
    } else if (ch === '}') {
      tokens.push({ type: 'close' });
      i++;
    } else if (ch === '"') {
      let value = '';
      i++;
      while (i < text.length && text[i] !== '"') {
        if (text[i] === '\\' && i + 1 < text.length) {
          value += ESCAPES[text[i + 1]] ?? text[i + 1];
          i += 2;
        } else {
          value += text[i++];
        }
      }
      if (i >= text.length) {
        throw new Error('Unterminated string in VDF');
      }
      i++;
      tokens.push({ type: 'string', value });
    } else if (ch === '[') {
      // Platform conditionals such as [$WIN32] carry no data we use
      while (i < text.length && text[i] !== ']') i++;
      i++;
    } else {
      let value = '';
      while (i < text.length && !/[\s{}"]/.test(text[i])) {
        value += text[i++];
      }
      tokens.push({ type: 'string', value });
    }
  }

  return tokens;
}

export function parseVdf(text: string): VdfObject {
  const tokens = tokenize(text);
  let pos = 0;

  function parseObject(nested: boolean): VdfObject {
    const result: VdfObject = {};

    while (pos < tokens.length) {
      const token = tokens[pos++];

      if (token.type === 'close') {
        if (!nested) {
          throw new Error('Unexpected "}" in VDF');
        }
        return result;
      }
      if (token.type === 'open') {
        throw new Error('Unexpected "{" in VDF');
      }

      const next = tokens[pos++];
      if (next === undefined) {
        throw new Error(`Missing value for key "${token.value}" in VDF`);
      }
      if (next.type === 'open') {
        result[token.value] = parseObject(true);
      } else if (next.type === 'string') {
        result[token.value] = next.value;
      } else {
        throw new Error(`Unexpected "}" after key "${token.value}" in VDF`);
      }
    }

    if (nested) {
      throw new Error('Unterminated object in VDF');
    }
    return result;
  }

  return parseObject(false);
}

/**
 * KeyValues keys are case-insensitive
 */
export function getVdfValue(object: VdfObject, key: string): VdfValue | undefined {
  const match = Object.keys(object).find(candidate => candidate.toLowerCase() === key.toLowerCase());
  return match === undefined ? undefined : object[match];
}

export function getVdfObject(object: VdfObject, key: string): VdfObject | undefined {
  const value = getVdfValue(object, key);
  return typeof value === 'object' ? value : undefined;
}

export function getVdfString(object: VdfObject, key: string): string | undefined {
  const value = getVdfValue(object, key);
  return typeof value === 'string' ? value : undefined;
}
