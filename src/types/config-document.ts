export type ConfigLine =
  | { kind: 'blank'; raw: string }
  | { kind: 'comment'; raw: string }
  | { kind: 'entry'; raw: string; key: string; value: string; prefix: string };

export type ConfigEntry = Extract<ConfigLine, { kind: 'entry' }>;

export interface ConfigSection {
  // null for the unnamed leading section
  name: string | null;
  header: string | null;
  lines: ConfigLine[];
}

export interface ConfigDocument {
  sections: ConfigSection[];
  newline: '\n' | '\r\n';
  trailingNewline: boolean;
}

interface PatchTarget {
  // null addresses keys above the first section header
  section: string | null;
  key: string;
  value: string;
}

export type ConfigPatch =
  | ({ mode: 'overwrite' } & PatchTarget)
  | ({ mode: 'setIfAbsent' } & PatchTarget)
  | ({ mode: 'appendToList'; delimiter?: string } & PatchTarget);
