export type OptionKind =
  | { type: 'value' }
  | { type: 'switch' }
  | { type: 'multi' }
  | { type: 'keyValue' }
  | { type: 'positional'; index: number };

export type OptionKindType = OptionKind['type'];

export const Kind = {
  /** Takes exactly one following token: `--pic lol.jpg` */
  value: { type: 'value' },
  /** Boolean, takes nothing: `--verbose` */
  switch: { type: 'switch' },
  /** Takes every following token up to the next flag: `--pics 1.png 2.png` */
  multi: { type: 'multi' },
  /** Like `multi`, with `key:value` tokens: `--pics mon:1.jpg tue:2.jpg` */
  keyValue: { type: 'keyValue' },
  /** Taken from the stream position among tokens no flag claimed */
  positional: (index: number): OptionKind => ({ type: 'positional', index }),
} as const satisfies Record<OptionKindType, OptionKind | ((index: number) => OptionKind)>;

export const KIND_LABELS: Record<OptionKindType, string> = {
  value: 'Value',
  switch: 'Switch',
  multi: 'MultiValue',
  keyValue: 'KeyValueList',
  positional: 'Positional',
};

export interface OptionSpec {
  name: string;
  defaultValue: string | undefined;
  flag: string;
  required: boolean;
  help: string;
  kind: OptionKind;
}

export interface DeclareOptions {
  flag: string;
  kind: OptionKind;
  required?: boolean;
  default?: string;
  help?: string;
}

export interface ResolvedOption {
  spec: OptionSpec;
  value: string | undefined;
  count: number;
}

// The literal a matched switch resolves to
export const TRUE_LITERAL = 'true';
