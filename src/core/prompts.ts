import { readFile } from 'node:fs/promises';
import fs from 'node:fs';
import path from 'node:path';

export type PromptName =
  | 'reviewer'
  | 'initial_writer'
  | 'validator'
  | 'refiner'
  | 'release';

const PROMPT_NAMES: readonly PromptName[] = ['reviewer', 'initial_writer', 'validator', 'refiner', 'release'];

let loaded = false;
const PROMPTS: Partial<Record<PromptName, string>> = {};

export class PromptNotFoundError extends Error {
  constructor(name: string, dir: string) {
    super(`Prompt ${name}.md not found in ${dir}`);
    this.name = 'PromptNotFoundError';
  }
}

export function promptsDir(): string {
  const candidates: string[] = [];
  if (process.env.PROMPTS_DIR) candidates.push(path.resolve(process.env.PROMPTS_DIR));
  candidates.push(path.join(__dirname, '..', 'prompts'));
  candidates.push(path.join(process.cwd(), 'src', 'prompts'));
  return candidates.find((c) => fs.existsSync(c)) ?? path.join(process.cwd(), 'src', 'prompts');
}

export async function preloadPrompts(): Promise<void> {
  if (loaded) return;
  const base = promptsDir();
  await Promise.all(PROMPT_NAMES.map(async (name) => {
    try {
      PROMPTS[name] = await readFile(path.join(base, `${name}.md`), 'utf-8');
    } catch {
      throw new PromptNotFoundError(name, base);
    }
  }));
  loaded = true;
}

export async function getPrompt(name: PromptName): Promise<string> {
  if (!loaded) await preloadPrompts();
  const text = PROMPTS[name];
  if (text === undefined) throw new PromptNotFoundError(name, promptsDir());
  return text;
}
