/**
 * Code Knowledge Graph - Path Utilities
 * @module utils/paths
 *
 * Path normalization and source file enumeration.
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import { join, sep } from 'node:path';
import { glob } from 'glob';
import ignore, { type Ignore } from 'ignore';

// =============================================================================
// Path Normalization
// =============================================================================

/**
 * Normalize path separators to forward slashes (Unix-style)
 */
export function normalizePath(path: string): string {
  return path.split(sep).join('/');
}

/**
 * Get file extension (lowercase, with dot)
 */
export function getExtension(filePath: string): string {
  const match = filePath.toLowerCase().match(/\.[^./]+$/);
  return match?.[0] || '';
}

// =============================================================================
// Ignore Handling
// =============================================================================

/**
 * Default ignore patterns for code projects
 */
export const DEFAULT_IGNORE_PATTERNS = [
  // Dependencies
  'node_modules/',
  'vendor/',
  '.venv/',
  'venv/',
  '__pycache__/',
  '.dart_tool/',
  '.gradle/',

  // Build outputs
  'dist/',
  'build/',
  'out/',
  'target/',

  // IDE and VCS
  '.idea/',
  '.vscode/',
  '.git/',
];

/**
 * Create an ignore instance from patterns
 */
export function createIgnoreFilter(patterns: string[]): Ignore {
  return ignore().add(patterns);
}

/**
 * Read `.gitignore` patterns from a project root, skipping comments
 */
export function readGitignore(rootPath: string): string[] {
  const gitignorePath = join(rootPath, '.gitignore');
  if (!existsSync(gitignorePath)) return [];

  return readFileSync(gitignorePath, 'utf-8')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'));
}

// =============================================================================
// File Enumeration
// =============================================================================

/**
 * List files under `rootPath` with one of the given extensions, relative to
 * the root and sorted, after applying default, `.gitignore` and extra
 * ignore patterns.
 */
export async function listSourceFiles(
  rootPath: string,
  extensions: string[],
  extraIgnore: string[] = []
): Promise<string[]> {
  if (extensions.length === 0) return [];

  const filter = createIgnoreFilter([
    ...DEFAULT_IGNORE_PATTERNS,
    ...readGitignore(rootPath),
    ...extraIgnore,
  ]);

  const files = await glob(
    extensions.map((ext) => `**/*${ext}`),
    {
      cwd: rootPath,
      nodir: true,
      dot: false,
      ignore: ['**/node_modules/**', '**/.git/**'],
    }
  );

  return files
    .map(normalizePath)
    .filter((file) => !filter.ignores(file))
    .sort();
}

// =============================================================================
// Path Validation
// =============================================================================

/**
 * Check if a path exists and is a directory
 */
export function isDirectory(dirPath: string): boolean {
  try {
    return statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}
