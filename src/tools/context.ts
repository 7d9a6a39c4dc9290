import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { errorMessage } from '../logger.js';
import { toolError, toolResult } from '../utils.js';

export const DEFAULT_GUIDE = 'introduction';

export const contextTools = {
  get_context: {
    description: "Get Diffusion MCP server context and usage guides - start with 'introduction'.",
  },
};

const guideIndexSchema = z.record(z.string());

/**
 * `guides/` sits at the package root, two levels above this module in the
 * sources and three above it in the build output.
 */
export function defaultGuidesDir(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const candidates = [join(here, '..', '..', 'guides'), join(here, '..', '..', '..', 'guides')];
  return candidates.find((dir) => existsSync(join(dir, 'index.json'))) ?? candidates[0];
}

export class GuideLibrary {
  private index: Record<string, string> | undefined;

  constructor(private readonly dir: string = defaultGuidesDir()) {}

  /** Guide names mapped to their one-line descriptions, in index order. */
  async guides(): Promise<Record<string, string>> {
    if (!this.index) {
      const raw: unknown = JSON.parse(await readFile(join(this.dir, 'index.json'), 'utf8'));
      this.index = guideIndexSchema.parse(raw);
    }
    return this.index;
  }

  async has(name: string): Promise<boolean> {
    return Object.prototype.hasOwnProperty.call(await this.guides(), name);
  }

  async read(name: string): Promise<string> {
    return readFile(join(this.dir, `${name}.md`), 'utf8');
  }
}

export async function handleGetContext(library: GuideLibrary, args: { type?: string }): Promise<CallToolResult> {
  const type = (args.type?.trim() || DEFAULT_GUIDE).toLowerCase();
  try {
    if (!(await library.has(type))) {
      const available = Object.keys(await library.guides()).join(', ');
      return toolResult(`# Unknown guide\nThe guide "${type}" is not available.\nAvailable guides: ${available}\n`);
    }
    return toolResult(await library.read(type));
  } catch (error) {
    return toolError(`Error loading guide ${type}: ${errorMessage(error)}`);
  }
}
