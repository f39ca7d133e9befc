import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import dotenvExpand from 'dotenv-expand';

// .env beside the project root (.. from offchain/), then the working dir
const ROOT = path.resolve(__dirname, '..', '..');
export const ENV_CANDIDATES = [path.join(ROOT, '.env'), path.resolve(process.cwd(), '.env')];

export const REQUIRED_ENV = ['WALLET_PK', 'RPC_TIER1_HTTP'];

// Values set in the shell win over the file for these.
const SHELL_WINS = ['DATABASE_URL', 'REDIS_URL', 'PROM_PORT', 'ENGINE_CONFIG', 'LOG_LEVEL'];

const UNEXPANDED = /\$\{.*\}/;

function usable(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== '' && !UNEXPANDED.test(value);
}

export function missingEnv(names: readonly string[], env: NodeJS.ProcessEnv = process.env): string[] {
  return names.filter((name) => !usable(env[name]));
}

export type EnvLoad = { file: string | null; missing: string[] };

/** Loads the first existing candidate into process.env with ${VAR} expansion. */
export function loadEnv(candidates: readonly string[] = ENV_CANDIDATES, required: readonly string[] = REQUIRED_ENV): EnvLoad {
  const file = candidates.find((candidate) => fs.existsSync(candidate)) ?? null;
  if (file) {
    const shell = SHELL_WINS.map((key) => [key, process.env[key]] as const);
    const result = dotenv.config({ path: file, override: true });
    dotenvExpand.expand(result);
    for (const [key, value] of shell) {
      if (usable(value)) process.env[key] = value;
    }
  }
  return { file, missing: missingEnv(required) };
}

if (process.env.ENGINE_SKIP_DOTENV !== '1') {
  for (const name of loadEnv().missing) {
    console.warn(`[env] WARN missing or unexpanded var: ${name}`);
  }
}
