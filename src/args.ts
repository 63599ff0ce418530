// Schema-based command line parsing for the example apps.
// Parsed values are typed from the schema; help text is generated from it.

interface BaseOption {
  /** Help text description */
  description: string;
  /** Single-character short form (e.g., 'v' for -v) */
  alias?: string;
}

export interface StringOption extends BaseOption {
  type: 'string';
  default?: string;
  choices?: readonly string[];
}

export interface NumberOption extends BaseOption {
  type: 'number';
  default?: number;
  min?: number;
  max?: number;
  /** Reject non-integers */
  integer?: boolean;
}

export interface BooleanOption extends BaseOption {
  type: 'boolean';
  default?: boolean;
}

export type ArgOption = StringOption | NumberOption | BooleanOption;

export type ArgSchema = {
  readonly [key: string]: ArgOption;
};

type InferOptionValue<T extends ArgOption> = T extends StringOption
  ? T['choices'] extends readonly string[]
    ? T['choices'][number]
    : string
  : T extends NumberOption
    ? number
    : boolean;

export type ParsedArgs<T extends ArgSchema> = {
  [K in keyof T]: InferOptionValue<T[K]>;
} & {
  /** True if --help or -h was passed */
  help: boolean;
  helpText: string;
};

function toKebabCase(str: string): string {
  return str.replace(/([a-z])([A-Z])/g, '$1-$2').toLowerCase();
}

export function generateHelpText(schema: ArgSchema, usage = 'Usage: [OPTIONS]'): string {
  const rows: Array<{ option: string; description: string }> = [];

  for (const [key, opt] of Object.entries(schema)) {
    const long = `--${toKebabCase(key)}${opt.type === 'boolean' ? '' : ` <${opt.type}>`}`;
    const option = opt.alias ? `-${opt.alias}, ${long}` : `    ${long}`;

    let description = opt.description;
    if (opt.type === 'string' && opt.choices) {
      description += ` [${opt.choices.join('|')}]`;
    }
    if (opt.type === 'number') {
      const bounds: string[] = [];
      if (opt.min !== undefined) bounds.push(`>= ${opt.min}`);
      if (opt.max !== undefined) bounds.push(`<= ${opt.max}`);
      if (bounds.length > 0) description += ` (${bounds.join(', ')})`;
    }
    if (opt.default !== undefined) {
      description += ` (default: ${typeof opt.default === 'string' ? `"${opt.default}"` : String(opt.default)})`;
    }
    rows.push({ option, description });
  }
  rows.push({ option: '-h, --help', description: 'Show this help message' });

  const width = Math.max(...rows.map((r) => r.option.length)) + 2;
  return [usage, '', 'Options:', ...rows.map((r) => `  ${r.option.padEnd(width)}${r.description}`)].join('\n');
}

function convert(key: string, opt: ArgOption, raw: string | boolean, helpText: string): string | number | boolean {
  const flag = `--${toKebabCase(key)}`;
  const fail = (reason: string): never => {
    throw new Error(`Error: ${flag}: ${reason}\n\n${helpText}`);
  };

  switch (opt.type) {
    case 'boolean':
      return raw === true || raw === 'true';
    case 'string': {
      const value = String(raw);
      if (opt.choices && !opt.choices.includes(value)) {
        fail(`must be one of [${opt.choices.join(', ')}], got '${value}'`);
      }
      return value;
    }
    case 'number': {
      const value = Number(raw);
      if (raw === true || raw === '' || !Number.isFinite(value)) fail(`expected number, got '${String(raw)}'`);
      if (opt.integer && !Number.isInteger(value)) fail(`expected integer, got ${value}`);
      if (opt.min !== undefined && value < opt.min) fail(`must be >= ${opt.min}, got ${value}`);
      if (opt.max !== undefined && value > opt.max) fail(`must be <= ${opt.max}, got ${value}`);
      return value;
    }
  }
}

/**
 * Parse and validate command line arguments against a schema
 *
 * @example
 * ```ts
 * const args = parseArgs({
 *   text: { type: 'string', default: 'hello world', description: 'Text to translate' },
 *   beamWidth: { type: 'number', default: 4, min: 1, integer: true, description: 'Beam width' },
 *   verbose: { type: 'boolean', alias: 'v', description: 'Verbose output' },
 * } as const, process.argv.slice(2));
 * ```
 */
export function parseArgs<T extends ArgSchema>(schema: T, argv: readonly string[]): ParsedArgs<T> {
  const helpText = generateHelpText(schema);
  const help = argv.includes('-h') || argv.includes('--help');

  // --max-steps and --maxSteps both resolve to maxSteps
  const keyByName = new Map<string, string>();
  const keyByAlias = new Map<string, string>();
  for (const [key, opt] of Object.entries(schema)) {
    keyByName.set(toKebabCase(key), key);
    keyByName.set(key, key);
    if (opt.alias) keyByAlias.set(opt.alias, key);
  }

  const raw = new Map<string, string | boolean>();
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    let key: string | undefined;
    let inline: string | undefined;

    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      const name = eq >= 0 ? body.slice(0, eq) : body;
      inline = eq >= 0 ? body.slice(eq + 1) : undefined;

      const negated = name.startsWith('no-') ? keyByName.get(name.slice(3)) : undefined;
      if (negated !== undefined && schema[negated].type === 'boolean' && inline === undefined) {
        raw.set(negated, false);
        continue;
      }
      key = keyByName.get(name);
    } else if (arg.startsWith('-') && arg.length === 2) {
      key = keyByAlias.get(arg[1]);
    }

    if (key === undefined) continue;
    if (inline !== undefined) {
      raw.set(key, inline);
    } else if (schema[key].type === 'boolean') {
      raw.set(key, true);
    } else if (i + 1 < argv.length) {
      raw.set(key, argv[++i]);
    }
  }

  const result: Record<string, string | number | boolean> = {};
  for (const [key, opt] of Object.entries(schema)) {
    const value = raw.get(key);
    if (value !== undefined && !help) {
      result[key] = convert(key, opt, value, helpText);
    } else if (opt.default !== undefined) {
      result[key] = opt.default;
    } else if (opt.type === 'boolean') {
      result[key] = false;
    } else if (!help) {
      throw new Error(`Error: --${toKebabCase(key)} is required\n\n${helpText}`);
    }
  }

  // Field types follow from the schema checks above
  return { ...result, help, helpText } as ParsedArgs<T>;
}
