/**
 * Frontmatter I/O for vault notes
 */

import fs from 'fs/promises';
import path from 'path';
import matter from 'gray-matter';
import * as yaml from 'js-yaml';

/**
 * Line ending types
 */
export type LineEnding = 'LF' | 'CRLF';

/**
 * Detect the line ending style used in content.
 * Returns 'CRLF' if Windows-style line endings dominate, 'LF' otherwise.
 */
export function detectLineEnding(content: string): LineEnding {
  const crlfCount = (content.match(/\r\n/g) || []).length;
  const lfCount = (content.match(/(?<!\r)\n/g) || []).length;

  return crlfCount > lfCount ? 'CRLF' : 'LF';
}

/**
 * Normalize line endings to LF for internal processing.
 */
export function normalizeLineEndings(content: string): string {
  return content.replace(/\r\n/g, '\n');
}

/**
 * Convert line endings to the specified style.
 */
export function convertLineEndings(content: string, style: LineEnding): string {
  const normalized = content.replace(/\r\n/g, '\n');
  return style === 'CRLF' ? normalized.replace(/\n/g, '\r\n') : normalized;
}

/**
 * Ensure content ends with exactly one newline.
 */
export function normalizeTrailingNewline(content: string): string {
  return content.replace(/[\r\n\s]+$/, '') + '\n';
}

/**
 * Validate a vault-relative note path against traversal outside the vault.
 */
export function validatePath(vaultPath: string, notePath: string): boolean {
  if (notePath.length === 0) {
    return false;
  }
  // Unix absolute paths, UNC paths and Windows-style absolute paths
  if (notePath.startsWith('/') || notePath.startsWith('\\')) {
    return false;
  }
  // On Unix, "C:\path" is a valid literal filename
  if (process.platform === 'win32' && /^[a-zA-Z]:/.test(notePath)) {
    return false;
  }

  const resolvedVault = path.resolve(vaultPath);
  const resolvedNote = path.resolve(vaultPath, notePath);
  const relative = path.relative(resolvedVault, resolvedNote);

  if (relative.length === 0 || path.isAbsolute(relative)) {
    return false;
  }
  return relative !== '..' && !relative.startsWith(`..${path.sep}`);
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * YAML engine for gray-matter. The core schema keeps dates and other
 * timestamps as the strings they were written as, and only mappings are
 * accepted as frontmatter.
 */
const yamlEngine = {
  parse(input: string): Record<string, unknown> {
    const data = yaml.load(input, { schema: yaml.CORE_SCHEMA });
    if (data === null || data === undefined) {
      return {};
    }
    if (!isMapping(data)) {
      throw new yaml.YAMLException(`frontmatter must be a mapping, got ${Array.isArray(data) ? 'a list' : typeof data}`);
    }
    return data;
  },
  stringify(data: object): string {
    return yaml.dump(data, { schema: yaml.CORE_SCHEMA, lineWidth: -1 });
  },
};

const MATTER_OPTIONS = { engines: { yaml: yamlEngine } };

/**
 * Parsed note: body, frontmatter and the style it was written in
 */
export interface VaultFileContents {
  /** Body after the frontmatter block, normalized to LF */
  content: string;
  frontmatter: Record<string, unknown>;
  rawContent: string;
  lineEnding: LineEnding;
}

/**
 * Read a vault file with frontmatter parsing.
 *
 * Throws a YAMLException on parse errors and on frontmatter that is not a
 * mapping; callers decide whether that fails a batch.
 */
export async function readVaultFile(vaultPath: string, notePath: string): Promise<VaultFileContents> {
  if (!validatePath(vaultPath, notePath)) {
    throw new Error('Invalid path: path traversal not allowed');
  }

  const fullPath = path.join(vaultPath, notePath);
  const rawContent = await fs.readFile(fullPath, 'utf-8');

  const lineEnding = detectLineEnding(rawContent);

  // Passing options also bypasses gray-matter's content-keyed cache, which
  // returns a shared data object (or a half-parsed file after a YAML error)
  const parsed = matter(normalizeLineEndings(rawContent), MATTER_OPTIONS);

  return {
    content: parsed.content,
    frontmatter: parsed.data,
    rawContent,
    lineEnding,
  };
}

/**
 * Write a vault file, preserving the body and the original line endings.
 *
 * An empty frontmatter mapping writes the body with no frontmatter block.
 */
export async function writeVaultFile(
  vaultPath: string,
  notePath: string,
  content: string,
  frontmatter: Record<string, unknown>,
  lineEnding: LineEnding = 'LF'
): Promise<void> {
  if (!validatePath(vaultPath, notePath)) {
    throw new Error('Invalid path: path traversal not allowed');
  }

  const fullPath = path.join(vaultPath, notePath);

  let output = matter.stringify(content, frontmatter, MATTER_OPTIONS);
  output = normalizeTrailingNewline(output);
  output = convertLineEndings(output, lineEnding);

  await fs.writeFile(fullPath, output, 'utf-8');
}
