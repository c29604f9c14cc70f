import fs from 'fs/promises';
import path from 'path';

export function parseDotEnv(content: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }
    const idx = trimmed.indexOf('=');
    if (idx <= 0) {
      continue;
    }
    const key = trimmed.slice(0, idx).trim();
    let value = trimmed.slice(idx + 1).trim();
    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }
    values[key] = value;
  }
  return values;
}

export async function loadDotEnv(
  envPath: string = path.join(process.cwd(), '.env'),
  target: NodeJS.ProcessEnv = process.env
): Promise<void> {
  let content: string;
  try {
    content = await fs.readFile(envPath, 'utf-8');
  } catch {
    // No .env file found; skip.
    return;
  }
  for (const [key, value] of Object.entries(parseDotEnv(content))) {
    if (!target[key]) {
      target[key] = value;
    }
  }
}
