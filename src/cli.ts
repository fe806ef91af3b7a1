#!/usr/bin/env node
// src/cli.ts
import { parseArgs } from 'node:util';
import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { config, resolveModelChoice } from './config.js';
import { getErrorMessage } from './errors.js';
import { createScraper, formatArticleJson, formatArticleText } from './index.js';
import type { LLMProvider, ModelChoice } from './types/index.js';

export interface CliOptions {
  url: string;
  language?: string;
  json: boolean;
  modelChoice?: ModelChoice;
}

export type CliParseResult =
  | { ok: true; options: CliOptions }
  | { ok: true; help: true }
  | { ok: false; message: string };

const usageLines = [
  'Scrape a news article and print it as Markdown',
  '',
  'Usage:',
  '  news-markdown <url> [--language <name>] [--json] [--provider <openai|anthropic>] [--model <id>]',
  '',
  'Options:',
  '  --language, -l  Output language (default: DEFAULT_LANGUAGE or english).',
  '  --json, -j      Print the full article record as JSON.',
  '  --provider      LLM provider (default: LLM_PROVIDER or openai).',
  '  --model         Model id (default: LLM_MODEL or the provider default).',
  '  --help, -h      Show this help message.',
  '',
  'Requires OPENAI_API_KEY (or ANTHROPIC_API_KEY for --provider anthropic).',
  '',
] as const;

const optionSchema = {
  language: { type: 'string', short: 'l' },
  json: { type: 'boolean', short: 'j', default: false },
  provider: { type: 'string' },
  model: { type: 'string' },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

export function renderCliUsage(): string {
  return `${usageLines.join('\n')}\n`;
}

function isProvider(value: string): value is LLMProvider {
  return value === 'openai' || value === 'anthropic';
}

function readArgs(args: readonly string[]) {
  return parseArgs({
    args: [...args],
    options: optionSchema,
    strict: true,
    allowPositionals: true,
  });
}

export function parseCliArgs(args: readonly string[], defaults: ModelChoice): CliParseResult {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(args);
  } catch (error) {
    return { ok: false, message: getErrorMessage(error) };
  }

  const { values, positionals } = parsed;
  if (values.help) {
    return { ok: true, help: true };
  }

  if (positionals.length !== 1) {
    return { ok: false, message: 'Expected exactly one URL argument' };
  }

  const provider = values.provider ?? defaults.provider;
  if (!isProvider(provider)) {
    return { ok: false, message: `Unknown provider: ${provider}` };
  }

  const modelChoice = resolveModelChoice(
    defaults,
    values.provider === undefined ? undefined : provider,
    values.model
  );

  return {
    ok: true,
    options: {
      url: positionals[0],
      language: values.language,
      json: values.json ?? false,
      modelChoice,
    },
  };
}

async function main(): Promise<void> {
  const result = parseCliArgs(process.argv.slice(2), {
    provider: config.llmProvider,
    model: config.llmModel,
  });

  if (!result.ok) {
    console.error(`${result.message}\n\n${renderCliUsage()}`);
    process.exitCode = 1;
    return;
  }
  if ('help' in result) {
    process.stdout.write(renderCliUsage());
    return;
  }

  const { url, language, json, modelChoice } = result.options;
  const article = await createScraper(config).scrape(url, { language, modelChoice });

  if (article.error) {
    console.error(`Error during scraping: ${article.error}`);
    process.exitCode = 1;
    return;
  }

  console.log(json ? formatArticleJson(article) : formatArticleText(article));
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((error) => {
    console.error('Failed to run scraper:', error);
    process.exit(1);
  });
}
