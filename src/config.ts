/**
 * Run configuration: validated once at startup, before any request is made
 */
import { statSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { DEFAULT_REQUEST_TIMEOUT_MS } from './fetch/constants.js';

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

function isCompilable(pattern: string | null): boolean {
  if (pattern === null) return true;
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export const HeaderRuleSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, 'header name must not be empty')
    .transform((name) => name.toLowerCase()),
  pattern: z.string().nullable().refine(isCompilable, 'pattern is not a valid regular expression'),
});

export const RunConfigSchema = z.object({
  seed: z.string().refine(isHttpUrl, 'seed must be an absolute http:// or https:// URL'),
  timeoutMs: z
    .number()
    .int('timeout must be a whole number of milliseconds')
    .positive('timeout must be positive')
    .default(DEFAULT_REQUEST_TIMEOUT_MS),
  headerRules: z.array(HeaderRuleSchema).default([]),
  outputDir: z
    .string()
    .default(() => process.cwd())
    .transform((dir) => resolve(dir))
    .refine(isDirectory, 'output directory does not exist'),
});

export type RunConfigInput = z.input<typeof RunConfigSchema>;
export type RunConfig = z.output<typeof RunConfigSchema>;

export type ConfigResult = { ok: true; config: RunConfig } | { ok: false; error: string };

/** Flatten zod issues into one `path: message` line each. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    )
    .join('; ');
}

export function loadRunConfig(input: RunConfigInput): ConfigResult {
  const parsed = RunConfigSchema.safeParse(input);
  if (!parsed.success) return { ok: false, error: formatIssues(parsed.error) };
  return { ok: true, config: parsed.data };
}
