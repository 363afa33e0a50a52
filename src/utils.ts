/**
 * Utility functions for the scraper
 * Extracted for testability
 */

import type { RandomSource } from './types.js';

/** Flag to prevent multiple signal handlers from running */
let isExiting = false;

/**
 * Setup graceful shutdown handlers for SIGINT (Ctrl+C) and SIGTERM.
 * Displays a clean message instead of a stack trace when interrupted.
 * Should be called once at the start of the main entry point.
 *
 * @param commandName - Name of the command for the exit message (e.g., "Scraping", "Discovery")
 */
export function setupSignalHandlers(commandName: string): void {
  const handler = (signal: string) => {
    if (isExiting) return;
    isExiting = true;

    console.log(`\n${commandName} interrupted.`);

    // Exit with appropriate code (128 + signal number)
    // SIGINT = 2, SIGTERM = 15
    const exitCode = signal === 'SIGINT' ? 130 : 143;
    process.exit(exitCode);
  };

  process.on('SIGINT', () => handler('SIGINT'));
  process.on('SIGTERM', () => handler('SIGTERM'));
}

/**
 * Wait for specified milliseconds.
 *
 * @param ms - Duration to wait in milliseconds
 * @returns Promise that resolves after the delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Extract the base URL (protocol + host) from a full URL.
 *
 * @param url - Full URL to extract base from
 * @returns Base URL containing protocol and host
 * @throws {TypeError} If URL is invalid
 *
 * @example
 * getBaseUrl('https://example.com/path/to/page') // 'https://example.com'
 * getBaseUrl('http://localhost:3000/page') // 'http://localhost:3000'
 */
export function getBaseUrl(url: string): string {
  const parsed = new URL(url);
  return `${parsed.protocol}//${parsed.host}`;
}

// ============================================================================
// Randomness
// ============================================================================

/** Default random source backed by Math.random */
export const mathRandom: RandomSource = { next: () => Math.random() };

/**
 * Draw an integer uniformly from [min, max], both inclusive.
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random.next() * (max - min + 1));
}

/**
 * Draw a number uniformly from [min, max).
 */
export function randomBetween(random: RandomSource, min: number, max: number): number {
  return min + random.next() * (max - min);
}

// ============================================================================
// Argument Parsing Helpers
// ============================================================================

/**
 * Check if help flag is present in arguments.
 *
 * @param args - Command line arguments array
 * @returns True if --help or -h is present
 */
export function hasHelpFlag(args: string[]): boolean {
  return args.includes('--help') || args.includes('-h');
}

/**
 * Check if a boolean flag is present in arguments.
 */
export function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

/**
 * Get a string argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--output')
 * @param defaultValue - Default value if flag not found
 * @returns The argument value or default
 */
export function getStringArg(args: string[], flag: string, defaultValue: string): string {
  return getNullableStringArg(args, flag) ?? defaultValue;
}

/**
 * Get a nullable string argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--url')
 * @returns The argument value or null if not found
 */
export function getNullableStringArg(args: string[], flag: string): string | null {
  let result: string | null = null;
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === flag && value && !value.startsWith('--')) {
      result = value;
    }
  }
  return result;
}

/**
 * Get a number argument value from command line arguments.
 * Accepts fractional values (e.g., '--delay 0.5').
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--max')
 * @param defaultValue - Default value if flag not found or not numeric
 * @returns The parsed number or default
 */
export function getNumberArg(args: string[], flag: string, defaultValue: number): number {
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === flag && value) {
      const parsed = parseFloat(value);
      if (!isNaN(parsed)) {
        return parsed;
      }
    }
  }
  return defaultValue;
}

/**
 * Get the first positional (non-flag) argument.
 * Skips values that follow flags (e.g., in '--max 50', skips '50').
 *
 * @param args - Command line arguments array
 * @param knownFlags - Flags that take values (to skip their values)
 * @returns The first non-flag argument or empty string
 */
export function getPositionalArg(args: string[], knownFlags: string[] = []): string {
  let skipNext = false;
  for (const arg of args) {
    if (skipNext) {
      skipNext = false;
      continue;
    }
    if (knownFlags.includes(arg)) {
      skipNext = true;
      continue;
    }
    if (!arg.startsWith('-')) {
      return arg;
    }
  }
  return '';
}

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Check that a string is an absolute URL with both a scheme and a host.
 *
 * @example
 * isValidUrl('https://example.com/book/1') // true
 * isValidUrl('/book/show/1') // false
 * isValidUrl('mailto:someone@example.com') // false (no host)
 */
export function isValidUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol.length > 1 && parsed.host.length > 0;
  } catch {
    return false;
  }
}

/**
 * Validate that a string is a valid HTTP/HTTPS URL.
 *
 * @param url - URL string to validate
 * @returns Object with isValid boolean and error message if invalid
 *
 * @example
 * validateUrl('https://example.com') // { isValid: true }
 * validateUrl('not-a-url') // { isValid: false, error: 'Invalid URL format' }
 * validateUrl('ftp://example.com') // { isValid: false, error: 'URL must use http or https protocol' }
 */
export function validateUrl(url: string): { isValid: true } | { isValid: false; error: string } {
  if (!url) {
    return { isValid: false, error: 'URL is required' };
  }

  try {
    const parsed = new URL(url);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      return { isValid: false, error: 'URL must use http or https protocol' };
    }
    return { isValid: true };
  } catch {
    return { isValid: false, error: 'Invalid URL format' };
  }
}
