import { existsSync, readFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import dotenv from 'dotenv';
import type { RedditCredentials } from './clients/reddit.js';

export const CREDENTIALS_FILE_ENV = 'REDDIT_CREDENTIALS_FILE';

export interface CredentialDiscovery {
  explicitPath?: string | undefined;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  cwd?: string;
}

export function credentialCandidates(options: CredentialDiscovery = {}): string[] {
  const env = options.env ?? process.env;
  const home = options.homeDir ?? os.homedir();
  const cwd = options.cwd ?? process.cwd();

  const candidates = [
    options.explicitPath,
    env[CREDENTIALS_FILE_ENV],
    path.join(home, '.config', 'reddit-character.env'),
    path.join(home, '.reddit-character.env'),
    path.join(home, 'reddit_credentials', '.env'),
    path.join(cwd, '.env'),
  ];
  return candidates.filter((candidate): candidate is string => Boolean(candidate?.trim())).map((candidate) => path.resolve(cwd, candidate));
}

export function findCredentialsFile(options: CredentialDiscovery = {}): string | null {
  return credentialCandidates(options).find((candidate) => existsSync(candidate)) ?? null;
}

export interface LoadedCredentials {
  source: string | null;
  credentials: RedditCredentials | undefined;
  userAgent: string | undefined;
}

/**
 * Loads the first credentials file found into `env` (without overriding
 * variables already set) and reads the Reddit app settings from it.
 * Missing client id or secret means the client runs unauthenticated.
 */
export function loadCredentials(options: CredentialDiscovery = {}): LoadedCredentials {
  const env = options.env ?? process.env;
  if (options.explicitPath && !existsSync(path.resolve(options.cwd ?? process.cwd(), options.explicitPath))) {
    throw new Error(`Credentials file not found at ${options.explicitPath}`);
  }

  const source = findCredentialsFile({ ...options, env });
  if (source) {
    let parsed: Record<string, string>;
    try {
      parsed = dotenv.parse(readFileSync(source));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to read credentials file ${source}: ${message}`);
    }
    for (const [key, value] of Object.entries(parsed)) {
      if (env[key] === undefined) {
        env[key] = value;
      }
    }
  }

  const clientId = env.REDDIT_CLIENT_ID?.trim();
  const clientSecret = env.REDDIT_CLIENT_SECRET?.trim();
  const userAgent = env.REDDIT_USER_AGENT?.trim() || undefined;
  if (!clientId || !clientSecret) {
    return { source, credentials: undefined, userAgent };
  }

  return {
    source,
    credentials: {
      clientId,
      clientSecret,
      username: env.REDDIT_USERNAME?.trim() || undefined,
      password: env.REDDIT_PASSWORD || undefined,
    },
    userAgent,
  };
}

export function normalizeUsername(raw: string): string {
  const trimmed = raw.trim().replace(/^\/?u\//i, '');
  if (!/^[A-Za-z0-9_-]{1,32}$/.test(trimmed)) {
    throw new Error(`Invalid Reddit username: ${raw}`);
  }
  return trimmed;
}

export function parsePositiveInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Math.floor(Number(value));
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new Error(`Option --${flagName} must be a positive number.`);
  }
  return parsed;
}
