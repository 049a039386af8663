/**
 * Utility functions shared by the commands
 */

import crypto from 'crypto';

/** Callback for cleanup actions when process is interrupted */
type CleanupCallback = () => void | Promise<void>;

/** Registered cleanup callbacks for SIGINT handling */
const cleanupCallbacks: CleanupCallback[] = [];

/** Flag to prevent multiple SIGINT handlers from running */
let isExiting = false;

/**
 * Register a cleanup callback to be called when the process receives SIGINT.
 * Multiple callbacks can be registered and will be called in order.
 *
 * @param callback - Async or sync function to call during cleanup
 */
export function onInterrupt(callback: CleanupCallback): void {
  cleanupCallbacks.push(callback);
}

/**
 * Setup graceful shutdown handlers for SIGINT (Ctrl+C) and SIGTERM.
 * Displays a clean message instead of a stack trace when interrupted.
 * Should be called once at the start of the main entry point.
 *
 * @param commandName - Name of the command for the exit message (e.g., "Scan", "Watch")
 */
export function setupSignalHandlers(commandName: string): void {
  const handler = async (signal: string) => {
    if (isExiting) return;
    isExiting = true;

    console.log(`\n${commandName} interrupted.`);

    for (const callback of cleanupCallbacks) {
      try {
        await callback();
      } catch (error) {
        console.error(`Cleanup failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    // 128 + signal number (SIGINT = 2, SIGTERM = 15)
    const exitCode = signal === 'SIGINT' ? 130 : 143;
    process.exit(exitCode);
  };

  process.on('SIGINT', () => handler('SIGINT'));
  process.on('SIGTERM', () => handler('SIGTERM'));
}

/**
 * Convert a simple glob pattern to a RegExp.
 * Supports: * (any chars except /), ** (any chars including /), ? (single char)
 *
 * @param pattern - Glob pattern to convert
 * @returns RegExp that matches the pattern
 *
 * @example
 * globToRegex('day *\/chapter-*.md').test('day 1/chapter-2.md') // true
 * globToRegex('**\/*.md').test('part 1/day 3/chapter-1.md') // true
 */
export function globToRegex(pattern: string): RegExp {
  const escaped = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&') // Escape regex special chars (except * and ?)
    .replace(/\*\*/g, '{{GLOBSTAR}}') // Temp placeholder for **
    .replace(/\*/g, '[^/]*') // * matches anything except /
    .replace(/\?/g, '[^/]') // ? matches single char except /
    .replace(/\{\{GLOBSTAR\}\}/g, '.*'); // ** matches anything including /
  return new RegExp(`^${escaped}$`);
}

/**
 * Format duration in milliseconds to human-readable string
 *
 * @example
 * formatDuration(65000) // '1m 5s'
 * formatDuration(250) // '250ms'
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.max(0, Math.round(ms))}ms`;
  }

  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  return `${seconds}s`;
}

/** Hex SHA-256 of a string */
export function sha256(input: string): string {
  return crypto.createHash('sha256').update(input).digest('hex');
}

/** Choose singular or plural noun for a count */
export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
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
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--drafts')
 */
export function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

/**
 * Get a string argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--out')
 * @param defaultValue - Default value if flag not found
 * @returns The argument value or default
 */
export function getStringArg(args: string[], flag: string, defaultValue: string): string {
  let result = defaultValue;
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag && args[i + 1] && !args[i + 1].startsWith('--')) {
      result = args[i + 1];
    }
  }
  return result;
}

/**
 * Get a nullable string argument value from command line arguments.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--pattern')
 * @returns The argument value or null if not found
 */
export function getNullableStringArg(args: string[], flag: string): string | null {
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag && args[i + 1] && !args[i + 1].startsWith('--')) {
      return args[i + 1];
    }
  }
  return null;
}

/**
 * Get a number argument value from command line arguments.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--timeout')
 * @param defaultValue - Default value if flag not found
 * @returns The parsed number or default
 */
export function getNumberArg(args: string[], flag: string, defaultValue: number): number {
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag && args[i + 1]) {
      const parsed = parseInt(args[i + 1], 10);
      if (!isNaN(parsed)) {
        return parsed;
      }
    }
  }
  return defaultValue;
}

/**
 * Get the first positional (non-flag) argument.
 * Skips values that follow flags (e.g., in '--timeout 1000', skips '1000').
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
    if (!arg.startsWith('--') && !arg.startsWith('-')) {
      return arg;
    }
  }
  return '';
}
