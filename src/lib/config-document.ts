import type { ConfigDocument, ConfigEntry, ConfigLine, ConfigSection } from '../types';
import { PatchError } from '../installers/types';

const SECTION_HEADER = /^\[(.*)\]$/;
const COMMENT = /^[;#]/;

/**
 * Parse INI-style text into a loss-free document.
 *
 * Every line keeps its raw text, so serializing an unmodified document gives
 * back the input. The only normalization is line endings: a file with mixed
 * endings is rewritten with the first newline style it contains.
 */
export function parseConfigDocument(text: string, source = '<memory>'): ConfigDocument {
  const firstNewline = text.indexOf('\n');
  const newline = firstNewline > 0 && text[firstNewline - 1] === '\r' ? '\r\n' : '\n';
  const trailingNewline = text.endsWith('\n');

  const rawLines = text === '' ? [] : text.split(/\r?\n/);
  if (trailingNewline) {
    rawLines.pop();
  }

  let current: ConfigSection = { name: null, header: null, lines: [] };
  const sections: ConfigSection[] = [current];

  rawLines.forEach((raw, index) => {
    const trimmed = raw.trim();

    if (trimmed === '') {
      current.lines.push({ kind: 'blank', raw });
      return;
    }

    if (COMMENT.test(trimmed)) {
      current.lines.push({ kind: 'comment', raw });
      return;
    }

    const header = trimmed.match(SECTION_HEADER);
    if (header) {
      current = { name: header[1].trim(), header: raw, lines: [] };
      sections.push(current);
      return;
    }

    current.lines.push(parseEntry(raw, source, index + 1));
  });

  return { sections, newline, trailingNewline };
}

function parseEntry(raw: string, source: string, lineNumber: number): ConfigEntry {
  const eq = raw.indexOf('=');
  const key = eq >= 0 ? raw.slice(0, eq).trim() : '';
  if (!key) {
    throw new PatchError(`Malformed line ${lineNumber} in ${source}: "${raw}"`, source, lineNumber);
  }

  let valueStart = eq + 1;
  while (valueStart < raw.length && (raw[valueStart] === ' ' || raw[valueStart] === '\t')) {
    valueStart++;
  }

  return {
    kind: 'entry',
    raw,
    key,
    value: raw.slice(valueStart).trim(),
    prefix: raw.slice(0, valueStart),
  };
}

export function serializeConfigDocument(document: ConfigDocument): string {
  const lines: string[] = [];
  for (const section of document.sections) {
    if (section.header !== null) {
      lines.push(section.header);
    }
    for (const line of section.lines) {
      lines.push(line.raw);
    }
  }

  const body = lines.join(document.newline);
  return document.trailingNewline ? body + document.newline : body;
}

export function cloneConfigDocument(document: ConfigDocument): ConfigDocument {
  return structuredClone(document);
}

function isEntry(line: ConfigLine): line is ConfigEntry {
  return line.kind === 'entry';
}

/**
 * Duplicate sections and keys are allowed; the last occurrence wins
 */
export function findEntry(document: ConfigDocument, section: string | null, key: string): ConfigEntry | undefined {
  let found: ConfigEntry | undefined;
  for (const candidate of document.sections) {
    if (candidate.name !== section) {
      continue;
    }
    for (const line of candidate.lines) {
      if (isEntry(line) && line.key === key) {
        found = line;
      }
    }
  }
  return found;
}

export function getValue(document: ConfigDocument, section: string | null, key: string): string | undefined {
  return findEntry(document, section, key)?.value;
}

export function listEntries(document: ConfigDocument): Array<{ section: string | null; key: string; value: string }> {
  return document.sections.flatMap(section =>
    section.lines.filter(isEntry).map(entry => ({ section: section.name, key: entry.key, value: entry.value }))
  );
}

function isEmpty(document: ConfigDocument): boolean {
  return document.sections.every(section => section.header === null && section.lines.length === 0);
}

/**
 * Set a value in place. An unchanged value leaves the raw line untouched;
 * a changed value keeps the line's original key and spacing.
 */
export function setValue(document: ConfigDocument, section: string | null, key: string, value: string): void {
  const existing = findEntry(document, section, key);
  if (existing) {
    if (existing.value !== value) {
      existing.value = value;
      existing.raw = existing.prefix + value;
    }
    return;
  }

  const entry: ConfigEntry = { kind: 'entry', key, value, prefix: `${key}=`, raw: `${key}=${value}` };

  if (isEmpty(document)) {
    document.trailingNewline = true;
  }

  const target = [...document.sections].reverse().find(candidate => candidate.name === section);
  if (target) {
    let lastEntry = -1;
    target.lines.forEach((line, index) => {
      if (isEntry(line)) {
        lastEntry = index;
      }
    });
    target.lines.splice(lastEntry + 1, 0, entry);
    return;
  }

  if (section === null) {
    document.sections.unshift({ name: null, header: null, lines: [entry] });
    return;
  }

  const last = document.sections[document.sections.length - 1];
  const lastLine = last.lines[last.lines.length - 1];
  const hasContent = !isEmpty(document);
  if (hasContent && (lastLine === undefined || lastLine.kind !== 'blank')) {
    last.lines.push({ kind: 'blank', raw: '' });
  }

  document.sections.push({ name: section, header: `[${section}]`, lines: [entry] });
}
