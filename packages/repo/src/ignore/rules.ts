import nodeFs from 'node:fs/promises';
import { ConfigError, SilentLogger, describeFault, type Logger } from '@treedump/shared';
import type { IgnoreRuleSet } from './matcher';

export const VCS_DIRECTORY = '.git';
export const VCS_RULE = `${VCS_DIRECTORY}/`;

export interface LoadedRules {
  /** Absolute path of the rules source */
  path: string;
  /** False when the source was missing or unreadable and only built-in rules apply */
  found: boolean;
  rules: IgnoreRuleSet;
}

export interface LoadRulesOptions {
  /** Throw a ConfigError instead of degrading when the file cannot be read */
  required?: boolean;
  logger?: Logger;
  readFile?: (path: string, encoding: 'utf8') => Promise<string>;
}

/**
 * Parses rules text: one pattern per line, trimmed; blank lines and `#` comments are skipped.
 * The version-control exclusion is NOT appended here.
 */
export function parseIgnoreRules(text: string): string[] {
  const rules: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const stripped = line.trim();
    if (stripped && !stripped.startsWith('#')) {
      rules.push(stripped);
    }
  }
  return rules;
}

/**
 * Appends the always-on `.git/` rule after `rules`.
 */
export function withBuiltinRules(rules: readonly string[]): IgnoreRuleSet {
  return Object.freeze([...rules, VCS_RULE]);
}

export async function loadIgnoreRules(
  rulesPath: string,
  options: LoadRulesOptions = {},
): Promise<LoadedRules> {
  const logger = options.logger ?? new SilentLogger();
  const readFile = options.readFile ?? ((p: string, enc: 'utf8') => nodeFs.readFile(p, enc));

  let text: string;
  try {
    text = await readFile(rulesPath, 'utf8');
  } catch (error) {
    const reason = describeFault(error);
    if (options.required) {
      throw new ConfigError(`Ignore rules file could not be read: ${rulesPath}`, {
        cause: error,
        details: { rulesPath, reason },
      });
    }
    if (reason === 'ENOENT') {
      await logger.debug(`No ignore rules at ${rulesPath}; using built-in rules only.`);
    } else {
      await logger.warn(`Ignoring unreadable rules file ${rulesPath} (${reason}).`);
    }
    return { path: rulesPath, found: false, rules: withBuiltinRules([]) };
  }

  return { path: rulesPath, found: true, rules: withBuiltinRules(parseIgnoreRules(text)) };
}
