/**
 * Format Set Schema
 *
 * Runtime validation and normalization of format-set declarations, used
 * for the built-in table and for every user-supplied file. Declarations
 * are accepted in a few legacy shapes and always come out in the
 * canonical one:
 *
 *   - a top-level `columns` list becomes `formats: [{ types: ['ALL'], columns }]`
 *   - `entity_type` is read as `target_type`
 *   - `attributes` inside a Format is read as `columns`
 *   - `user_params` inside an action is read as `required_params`
 *   - an action given as a list uses its first element (with a warning)
 */

import { z } from 'zod';

/** Output modes the renderer understands */
export const OUTPUT_MODES = ['JSON', 'DICT', 'LIST', 'MD', 'FORM', 'REPORT', 'MERMAID', 'TABLE'] as const;
export type OutputMode = (typeof OUTPUT_MODES)[number];

/** Matches every output mode inside a Format's `types` */
export const WILDCARD_MODE = 'ALL';

export function isOutputMode(value: string): value is OutputMode {
  return OUTPUT_MODES.some(mode => mode === value);
}

export const columnSchema = z.object({
  name: z.string().min(1),
  key: z.string().min(1),
  format: z.boolean().default(false),
});

export type Column = z.infer<typeof columnSchema>;

const modeTagSchema = z.string().trim().min(1).transform(tag => tag.toUpperCase());

export const formatSchema = z
  .object({
    types: z.array(modeTagSchema).min(1, 'a Format must declare at least one output type'),
    columns: z.array(columnSchema).optional(),
    attributes: z.array(columnSchema).optional(),
  })
  .refine(f => f.columns !== undefined || f.attributes !== undefined, {
    message: 'a Format needs a columns list',
  })
  .transform(f => ({
    types: f.types,
    columns: f.columns ?? f.attributes ?? [],
  }));

export type Format = z.infer<typeof formatSchema>;

export const actionParameterSchema = z
  .object({
    function: z.string().min(1),
    required_params: z.array(z.string()).optional(),
    user_params: z.array(z.string()).optional(),
    optional_params: z.array(z.string()).default([]),
    spec_params: z.record(z.unknown()).default({}),
  })
  .transform(a => ({
    function: a.function,
    required_params: a.required_params ?? a.user_params ?? [],
    optional_params: a.optional_params,
    spec_params: a.spec_params,
  }));

export type ActionParameter = z.infer<typeof actionParameterSchema>;

const actionFieldSchema = z.union([actionParameterSchema, z.array(actionParameterSchema), z.null()]).optional();

const rawFormatSetSchema = z.object({
  target_type: z.string().optional(),
  entity_type: z.string().optional(),
  heading: z.string().default(''),
  description: z.string().default(''),
  family: z.string().optional(),
  aliases: z.array(z.string()).default([]),
  annotations: z.record(z.array(z.string())).default({}),
  formats: z.array(formatSchema).optional(),
  columns: z.array(columnSchema).optional(),
  action: actionFieldSchema,
  get_additional_props: actionFieldSchema,
});

type RawFormatSet = z.infer<typeof rawFormatSetSchema>;

export interface FormatSet {
  target_type?: string;
  heading: string;
  description: string;
  family?: string;
  aliases: string[];
  annotations: Record<string, string[]>;
  formats: Format[];
  action?: ActionParameter;
  get_additional_props?: ActionParameter;
}

export type FormatSetParseResult =
  | { ok: true; formatSet: FormatSet; warnings: string[] }
  | { ok: false; issues: string[] };

function describeIssues(error: z.ZodError): string[] {
  return error.errors.map(e => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message));
}

function pickAction(
  field: 'action' | 'get_additional_props',
  value: RawFormatSet['action'],
  warnings: string[]
): ActionParameter | undefined {
  if (value === undefined || value === null) return undefined;
  if (Array.isArray(value)) {
    if (value.length === 0) return undefined;
    warnings.push(`${field} was given as a list; using the first entry (${value[0].function})`);
    return value[0];
  }
  return value;
}

/**
 * Validate and normalize one format-set declaration
 */
export function parseFormatSet(raw: unknown): FormatSetParseResult {
  const parsed = rawFormatSetSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, issues: describeIssues(parsed.error) };
  }

  const data = parsed.data;
  const warnings: string[] = [];

  let formats: Format[];
  if (data.formats !== undefined) {
    formats = data.formats;
  } else if (data.columns !== undefined) {
    formats = [{ types: [WILDCARD_MODE], columns: data.columns }];
  } else {
    return { ok: false, issues: ['formats: a format set needs a formats or columns list'] };
  }
  if (formats.length === 0) {
    return { ok: false, issues: ['formats: a format set needs at least one Format'] };
  }

  const formatSet: FormatSet = {
    heading: data.heading,
    description: data.description,
    aliases: data.aliases,
    annotations: data.annotations,
    formats,
  };
  const targetType = data.target_type ?? data.entity_type;
  if (targetType !== undefined) formatSet.target_type = targetType;
  if (data.family !== undefined) formatSet.family = data.family;

  const action = pickAction('action', data.action, warnings);
  if (action) formatSet.action = action;
  const additional = pickAction('get_additional_props', data.get_additional_props, warnings);
  if (additional) formatSet.get_additional_props = additional;

  return { ok: true, formatSet, warnings };
}

export interface FormatSetFileEntry {
  name: string;
  result: FormatSetParseResult;
}

/**
 * Validate a whole file body: an object mapping kind name to declaration.
 * Returns one entry per kind, in file order; a body that is not an object
 * yields `undefined`.
 */
export function parseFormatSetFile(raw: unknown): FormatSetFileEntry[] | undefined {
  const parsed = z.record(z.unknown()).safeParse(raw);
  if (!parsed.success) return undefined;
  return Object.entries(parsed.data).map(([name, value]) => ({ name, result: parseFormatSet(value) }));
}

/**
 * Canonical, JSON-serializable form of a FormatSet (what saveToFile writes)
 */
export function toSerializable(formatSet: FormatSet): FormatSet {
  return {
    ...(formatSet.target_type !== undefined ? { target_type: formatSet.target_type } : {}),
    heading: formatSet.heading,
    description: formatSet.description,
    ...(formatSet.family !== undefined ? { family: formatSet.family } : {}),
    aliases: [...formatSet.aliases],
    annotations: { ...formatSet.annotations },
    formats: formatSet.formats.map(f => ({
      types: [...f.types],
      columns: f.columns.map(c => ({ ...c })),
    })),
    ...(formatSet.action ? { action: { ...formatSet.action } } : {}),
    ...(formatSet.get_additional_props ? { get_additional_props: { ...formatSet.get_additional_props } } : {}),
  };
}
