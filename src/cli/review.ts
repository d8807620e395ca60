#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';

import { CATEGORY_TABLE } from '../review/categories.js';
import { DEFAULT_PRIMARY_PATH, Orchestrator, type CycleOptions } from '../review/orchestrator.js';
import { formatCommentsForPr, renderConsolidatedJson, serializeComments } from '../review/render.js';
import { ClientCache } from '../lib/client-cache.js';
import { clampTemperature, loadConfig, parseCsvList, parseNumber } from '../lib/config.js';
import { getGitDiff, getStagedDiff } from '../lib/diff.js';
import { extractDiffFilePaths } from '../lib/diff-pack.js';
import { backendFactory } from '../lib/llm.js';
import { buildDiffContextPayload } from '../lib/role-prompts.js';

type ReviewInput = {
  payload: string;
  cycle: CycleOptions;
};

function getArg(name: string): string | undefined {
  const idx = process.argv.indexOf(`--${name}`);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
}

function hasFlag(name: string): boolean {
  return process.argv.includes(`--${name}`);
}

function readText(file: string): string {
  return fs.readFileSync(path.resolve(file), 'utf8');
}

function diffInput(diff: string): ReviewInput {
  const knownFilePaths = extractDiffFilePaths(diff);
  return {
    payload: diff,
    cycle: { diffOnly: true, primaryFilePath: knownFilePaths[0] ?? DEFAULT_PRIMARY_PATH, knownFilePaths },
  };
}

function resolveInput(): ReviewInput {
  const withContext = getArg('diff-with-context');
  if (withContext) {
    const contextFile = getArg('context-file');
    if (!contextFile) throw new Error('--diff-with-context needs --context-file <path>');
    const diff = readText(withContext);
    const knownFilePaths = extractDiffFilePaths(diff);
    return {
      payload: buildDiffContextPayload(diff, readText(contextFile)),
      cycle: { diffOnly: true, primaryFilePath: knownFilePaths[0] ?? contextFile, knownFilePaths },
    };
  }

  const diffFile = getArg('diff');
  if (diffFile) return diffInput(readText(diffFile));

  const repo = getArg('repo') || process.cwd();
  if (hasFlag('staged')) return diffInput(getStagedDiff({ cwd: repo }));

  const base = getArg('git-base');
  if (base) return diffInput(getGitDiff({ cwd: repo, baseRef: base, headRef: getArg('git-head') || 'HEAD' }));

  const file = getArg('file');
  if (file) return { payload: readText(file), cycle: { primaryFilePath: file } };

  const code = getArg('code');
  if (code) return { payload: code, cycle: { primaryFilePath: DEFAULT_PRIMARY_PATH } };

  throw new Error('Nothing to review: pass --file, --code, --diff, --diff-with-context, --staged or --git-base');
}

function listAgents(orchestrator: Orchestrator) {
  const stats = orchestrator.statistics();
  console.log(`Reviewers (${stats.enabled.length}/${stats.total} enabled):`);
  for (const c of stats.available) {
    const def = CATEGORY_TABLE[c];
    console.log(`  ${stats.enabled.includes(c) ? '[x]' : '[ ]'} ${c.padEnd(13)} ${def.reviewerName} (${def.title})`);
  }
}

async function main() {
  const config = loadConfig();
  const creativity = getArg('creativity');
  const agents = getArg('agents');

  const orchestrator = new Orchestrator({
    cache: new ClientCache(backendFactory(config.backendSettings)),
    backend: hasFlag('use-local') ? 'local' : config.backend,
    temperature: creativity ? clampTemperature(parseNumber(creativity, config.temperature)) : config.temperature,
    enabled: agents ? parseCsvList(agents) : config.agents,
    timeoutMs: config.timeoutMs,
    maxRetries: config.maxRetries,
  });

  if (hasFlag('list-agents')) {
    listAgents(orchestrator);
    return;
  }

  const { payload, cycle } = resolveInput();
  const report = await orchestrator.reviewCycle(payload, {
    ...cycle,
    parallel: hasFlag('sequential') ? false : config.parallel,
  });

  let output: string;
  if (hasFlag('json-issues')) output = serializeComments(report.comments);
  else if (hasFlag('json')) output = report.consolidated ? renderConsolidatedJson(report.consolidated, report.comments) : 'null';
  else output = formatCommentsForPr(report.comments);

  const out = getArg('out');
  if (out) {
    fs.mkdirSync(path.dirname(path.resolve(out)), { recursive: true });
    fs.writeFileSync(out, output, 'utf8');
    console.log(`Wrote: ${out} (state: ${report.state})`);
  } else {
    console.log(output);
  }

  if (!report.consolidated) process.exitCode = 2;
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
