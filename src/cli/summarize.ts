#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';

import { ClientCache } from '../lib/client-cache.js';
import { clampTemperature, loadConfig, parseNumber } from '../lib/config.js';
import { getGitDiff, getStagedDiff } from '../lib/diff.js';
import { fileChangesFromJson, parseDiffFileChanges, type FileChange } from '../lib/file-changes.js';
import { backendFactory } from '../lib/llm.js';
import {
  formatSummaryMarkdown,
  formatSummaryText,
  PrSummarizer,
  renderSummaryJson,
  type PrSummary,
} from '../review/summarizer.js';

const FORMATS = ['markdown', 'text', 'json', 'lines'] as const;
type Format = (typeof FORMATS)[number];

function getArg(name: string): string | undefined {
  const idx = process.argv.indexOf(`--${name}`);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
}

function hasFlag(name: string): boolean {
  return process.argv.includes(`--${name}`);
}

// `-` reads standard input.
function readText(file: string): string {
  return file === '-' ? fs.readFileSync(0, 'utf8') : fs.readFileSync(path.resolve(file), 'utf8');
}

function resolveChanges(): FileChange[] {
  const json = getArg('changes-json');
  if (json) {
    const data: unknown = JSON.parse(readText(json));
    return fileChangesFromJson(data);
  }

  const diffFile = getArg('diff');
  if (diffFile) return parseDiffFileChanges(readText(diffFile));

  const repo = getArg('repo') || process.cwd();
  if (hasFlag('staged')) return parseDiffFileChanges(getStagedDiff({ cwd: repo }));

  const base = getArg('git-base');
  if (base) return parseDiffFileChanges(getGitDiff({ cwd: repo, baseRef: base, headRef: getArg('git-head') || 'HEAD' }));

  throw new Error('Nothing to summarize: pass --changes-json, --diff, --staged or --git-base');
}

function resolveFormat(): Format {
  const raw = getArg('format') || 'markdown';
  const format = FORMATS.find((f) => f === raw);
  if (!format) throw new Error(`Unknown --format ${raw} (expected ${FORMATS.join(', ')})`);
  return format;
}

function render(summary: PrSummary, format: Format): string {
  switch (format) {
    case 'text':
      return formatSummaryText(summary);
    case 'json':
      return renderSummaryJson(summary);
    case 'lines':
      return JSON.stringify({ summary: formatSummaryMarkdown(summary).split('\n') }, null, 2);
    default:
      return formatSummaryMarkdown(summary);
  }
}

async function main() {
  const config = loadConfig();
  const creativity = getArg('creativity');
  const format = resolveFormat();

  const changes = resolveChanges();
  if (!changes.length) throw new Error('No file changes found in the input');

  const summarizer = new PrSummarizer({
    cache: new ClientCache(backendFactory(config.backendSettings)),
    backend: hasFlag('use-local') ? 'local' : config.backend,
    temperature: creativity ? clampTemperature(parseNumber(creativity, config.temperature)) : config.temperature,
  });

  const summary = await summarizer.summarize(changes, {
    context: getArg('context') ?? '',
    diagrams: hasFlag('diagrams'),
  });
  const output = render(summary, format);

  const out = getArg('out');
  if (out) {
    fs.mkdirSync(path.dirname(path.resolve(out)), { recursive: true });
    fs.writeFileSync(out, output, 'utf8');
    console.log(`Summary written to ${out}`);
  } else {
    console.log(output);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
