/**
 * Node configuration file support.
 *
 * Reads `config.json` from the node directory once per invocation. The
 * file is never written by the command surface.
 *
 * @packageDocumentation
 */

import { readFile } from 'fs/promises';
import { join, resolve } from 'path';

import { fromHex, keyPairFromPrivateKey } from '@tessera/crypto';
import { PublicKey } from '@tessera/ledger';
import type { Config } from '@tessera/ledger';
import {
  ConfigError,
  ErrorCode,
  isHexOfLength,
  isNonEmptyString,
  isPlainObject,
  sanitizeJsonInput,
} from '@tessera/types';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Name of the configuration file inside the node directory. */
export const CONFIG_FILE_NAME = 'config.json';

const KNOWN_FIELDS = new Set(['publicKey', 'privateKey', 'nodeModule']);

// ─── Public API ───────────────────────────────────────────────────────────────

/** Absolute path of the config file for the node directory `path`. */
export function configPath(path: string): string {
  return join(resolve(path), CONFIG_FILE_NAME);
}

function invalid(source: string, message: string, cause?: Error): ConfigError {
  return new ConfigError(ErrorCode.CONFIG_INVALID, `${source}: ${message}`, { cause });
}

/**
 * Validate the parsed contents of a config file.
 *
 * `publicKey` must be the key derived from `privateKey`.
 *
 * @param source - File name used in error messages.
 * @throws {ConfigError} `CONFIG_INVALID` naming the offending field.
 */
export async function parseConfig(raw: unknown, source: string = CONFIG_FILE_NAME): Promise<Config> {
  if (!isPlainObject(raw)) {
    throw invalid(source, 'must contain a JSON object');
  }
  const { publicKey, privateKey, nodeModule } = raw;
  if (!isHexOfLength(publicKey, PublicKey.LENGTH * 2)) {
    throw invalid(source, 'publicKey must be 64 hex characters');
  }
  if (!isHexOfLength(privateKey, 64)) {
    throw invalid(source, 'privateKey must be 64 hex characters');
  }
  let moduleSpecifier: string | undefined;
  if (nodeModule !== undefined) {
    if (!isNonEmptyString(nodeModule)) {
      throw invalid(source, 'nodeModule must be a non-empty string');
    }
    moduleSpecifier = nodeModule;
  }

  const privateKeyBytes = fromHex(privateKey, 'private key');
  const derived = await keyPairFromPrivateKey(privateKeyBytes);
  const configuredKey = new PublicKey(fromHex(publicKey, 'public key'));
  if (!configuredKey.equals(new PublicKey(derived.publicKey))) {
    throw invalid(source, 'publicKey does not belong to privateKey');
  }

  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!KNOWN_FIELDS.has(key)) {
      extra[key] = value;
    }
  }

  return Object.freeze({
    publicKey: configuredKey,
    privateKey: privateKeyBytes,
    ...(moduleSpecifier !== undefined ? { nodeModule: moduleSpecifier } : {}),
    extra: Object.freeze(extra),
  });
}

/**
 * Load `config.json` from the node directory.
 *
 * @throws {ConfigError} `CONFIG_NOT_FOUND` when the file does not exist,
 *   `CONFIG_INVALID` when it cannot be parsed or validated.
 */
export async function loadConfig(path: string): Promise<Config> {
  const file = configPath(path);
  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      ErrorCode.CONFIG_NOT_FOUND,
      `could not read ${file}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err instanceof Error ? err : undefined, hint: 'Pass --path <dir> pointing at the node directory.' },
    );
  }

  let raw: unknown;
  try {
    raw = sanitizeJsonInput(content);
  } catch (err) {
    throw invalid(file, `not valid JSON (${err instanceof Error ? err.message : String(err)})`, err instanceof Error ? err : undefined);
  }
  return parseConfig(raw, file);
}

/** Loggable view of a config: no key material beyond the public key. */
export function describeConfig(config: Config): Record<string, unknown> {
  return {
    publicKey: config.publicKey.toHex(),
    nodeModule: config.nodeModule ?? null,
    extraFields: Object.keys(config.extra).sort(),
  };
}
