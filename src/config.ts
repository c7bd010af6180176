import fs from 'fs';
import yaml from 'yaml';
import { z } from 'zod';
import { ConfigValidationError } from './errors.js';
import { SYNTAX_STYLES } from './highlighter.js';

const HEX_COLOR = /^[0-9A-Fa-f]{6}$/;

const color = (fallback: string) =>
  z.string().regex(HEX_COLOR, 'must be 6 hexadecimal digits').default(fallback);

export const ConfigSchema = z
  .object({
    language: z.string().min(1, 'must not be empty'),
    verbose: z.boolean().default(false),
    diff_font: z.string().min(1, 'must not be empty').default('Courier New'),
    diff_font_size: z
      .number()
      .int('must be an integer')
      .min(6, 'must be between 6 and 72')
      .max(72, 'must be between 6 and 72')
      .default(8),
    open_after_creation: z.boolean().default(false),
    heading_level: z
      .number()
      .int('must be an integer')
      .min(1, 'must be between 1 and 9')
      .max(9, 'must be between 1 and 9')
      .default(2),
    add_color: color('D0FFD0'),
    remove_color: color('FFD0D0'),
    neutral_color: color('F5F5F5'),
    add_symbol: z.string().default('+'),
    remove_symbol: z.string().default('-'),
    neutral_symbol: z.string().default(' '),
    file_encoding: z
      .string()
      .refine((e): e is BufferEncoding => Buffer.isEncoding(e), 'must be a supported text encoding')
      .default('utf-8'),
    include_first_commit: z.boolean().default(false),
    ignore_file: z.string().min(1, 'must not be empty').default('.gddignore'),
    include_unchanged_lines: z.boolean().default(true),
    include_images: z.boolean().default(true),
    insert_page_breaks: z.boolean().default(true),
    include_line_numbers: z.boolean().default(true),
    legend_position: z.enum(['before', 'after', 'none']).default('before'),
    syntax_style: z.enum(SYNTAX_STYLES).default('default')
  })
  .strict();

export type Configuration = Readonly<z.output<typeof ConfigSchema>>;

export function resolveConfig(userOverrides: unknown): Configuration {
  const result = ConfigSchema.safeParse(userOverrides);
  if (!result.success) {
    const [issue] = result.error.issues;
    if (issue.code === 'unrecognized_keys') {
      throw new ConfigValidationError(issue.keys.join(', '), 'unknown key');
    }
    throw new ConfigValidationError(issue.path.join('.') || '(root)', issue.message);
  }
  return Object.freeze(result.data);
}

/** Reads a JSON or YAML config file without validating it. */
export function loadConfigFile(file: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf-8');
  } catch (err) {
    throw new ConfigValidationError(file, `cannot be read (${(err as Error).message})`);
  }
  try {
    return /\.ya?ml$/i.test(file) ? yaml.parse(raw) : JSON.parse(raw);
  } catch (err) {
    throw new ConfigValidationError(file, `is not valid (${(err as Error).message})`);
  }
}

export function loadConfig(file: string, overrides: Record<string, unknown> = {}): Configuration {
  const data = loadConfigFile(file);
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new ConfigValidationError(file, 'must contain an object');
  }
  const defined = Object.entries(overrides).filter(([, v]) => v !== undefined);
  return resolveConfig({ ...data, ...Object.fromEntries(defined) });
}
