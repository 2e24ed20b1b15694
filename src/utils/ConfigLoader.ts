/**
 * Utility for loading and validating configuration
 */

import { readFileSync } from 'fs';

/**
 * Load a tracker pattern table: a JSON list of non-empty substrings
 * @param configPath - Path to the JSON file
 * @throws Error if file cannot be read or parsed, or is not a list of strings
 */
export function loadTrackerPatterns(configPath: string): string[] {
  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`Tracker pattern file not found: ${configPath}`);
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(content);
  if (!Array.isArray(parsed)) {
    throw new Error(`Invalid tracker pattern file ${configPath}: expected a list of strings`);
  }

  return parsed.map((pattern: unknown, index) => {
    if (typeof pattern !== 'string' || pattern.trim() === '') {
      throw new Error(`Invalid tracker pattern at index ${index} in ${configPath}`);
    }
    return pattern.trim();
  });
}

/**
 * Parse a command-line number that must be a positive integer
 * @param name - Option name used in the error message
 * @throws Error if the value is not a positive integer
 */
export function parsePositiveInt(value: string, name: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Load environment variable with fallback
 * @param key - Environment variable key
 * @param defaultValue - Default value if not found
 */
export function getEnvVar(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}
