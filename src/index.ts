import * as core from '@actions/core';
import * as github from '@actions/github';

import fs from 'node:fs/promises';
import path from 'node:path';

import { ClientCache } from './lib/client-cache.js';
import { loadConfig, parseBool, parseNumber } from './lib/config.js';
import { extractDiffFilePaths, packUnifiedDiff } from './lib/diff-pack.js';
import { errorMessage } from './lib/errors.js';
import { parseDiffFileChanges } from './lib/file-changes.js';
import { backendFactory } from './lib/llm.js';
import { DEFAULT_PRIMARY_PATH, Orchestrator, type CycleReport } from './review/orchestrator.js';
import { commentsToInlineComments } from './review/pr-comments.js';
import { formatCommentsForPr, renderConsolidatedJson, serializeComments } from './review/render.js';
import { formatSummaryMarkdown, PrSummarizer } from './review/summarizer.js';

const MARKER = '<!-- review-panel -->';

type Octokit = ReturnType<typeof github.getOctokit>;
type PrRef = { owner: string; repo: string; prNumber: number };

async function fetchPrDiff(octokit: Octokit, { owner, repo, prNumber }: PrRef): Promise<string> {
  const res = await octokit.request('GET /repos/{owner}/{repo}/pulls/{pull_number}', {
    owner,
    repo,
    pull_number: prNumber,
    headers: { accept: 'application/vnd.github.v3.diff' },
  });
  // With the diff media type GitHub returns the raw patch text.
  const data: unknown = res.data;
  if (typeof data !== 'string') throw new Error('GitHub did not return a text diff for the pull request');
  return data;
}

function buildReviewMarkdown(report: CycleReport, selectedFiles: string[], truncated: boolean): string {
  const lines: string[] = [MARKER, '## 🤖 Review Panel', ''];

  if (!report.consolidated) {
    const reason = report.transitions.at(-1)?.reason ?? 'no review possible';
    lines.push(`⚠️ Review could not be completed: ${reason}.`);
    return lines.join('\n');
  }

  lines.push(`Overall score: **${report.consolidated.overallScore}/10**`);
  lines.push('');
  lines.push(report.consolidated.summary);
  lines.push('');
  lines.push(`Reviewed files: ${selectedFiles.length}${truncated ? ' (diff truncated)' : ''}`);
  if (report.failedCategories.length) {
    lines.push('');
    lines.push(`⚠️ Reviewers without a result: ${report.failedCategories.join(', ')}`);
  }
  lines.push('');
  lines.push(formatCommentsForPr(report.comments));

  if (report.consolidated.priorityRecommendations.length) {
    lines.push('');
    lines.push('<details>');
    lines.push('<summary>Priority recommendations</summary>');
    lines.push('');
    for (const r of report.consolidated.priorityRecommendations) lines.push(`- ${r}`);
    lines.push('</details>');
  }

  return lines.join('\n');
}

async function upsertSummaryComment(octokit: Octokit, { owner, repo, prNumber }: PrRef, body: string) {
  const comments = await octokit.request('GET /repos/{owner}/{repo}/issues/{issue_number}/comments', {
    owner,
    repo,
    issue_number: prNumber,
    per_page: 100,
  });

  const existing = comments.data.find((c) => typeof c.body === 'string' && c.body.includes(MARKER));

  if (existing) {
    await octokit.request('PATCH /repos/{owner}/{repo}/issues/comments/{comment_id}', {
      owner,
      repo,
      comment_id: existing.id,
      body,
    });
    core.info('Updated existing PR review comment.');
  } else {
    await octokit.request('POST /repos/{owner}/{repo}/issues/{issue_number}/comments', {
      owner,
      repo,
      issue_number: prNumber,
      body,
    });
    core.info('Posted PR review comment.');
  }
}

async function writeOutputs(outputDir: string, files: Record<string, string>) {
  const workspace = process.env.GITHUB_WORKSPACE || process.cwd();
  const outDirAbs = path.isAbsolute(outputDir) ? outputDir : path.join(workspace, outputDir);

  await fs.mkdir(outDirAbs, { recursive: true });
  await Promise.all(Object.entries(files).map(([name, content]) => fs.writeFile(path.join(outDirAbs, name), content, 'utf8')));

  core.setOutput('output_dir', path.relative(workspace, outDirAbs));
}

async function run() {
  const ghToken = core.getInput('github_token') || process.env.GITHUB_TOKEN;
  if (!ghToken) throw new Error('GitHub token is missing (github_token input / GITHUB_TOKEN env)');

  const config = loadConfig();
  const maxFiles = parseNumber(core.getInput('max_files'), 25);
  const maxTotalChars = parseNumber(core.getInput('max_total_chars'), 120_000);
  const outputDir = core.getInput('output_dir') || '.review-panel';
  const writeFiles = parseBool(core.getInput('write_files'), true);
  const inline = parseBool(core.getInput('inline_comments'), false);
  const summarize = parseBool(core.getInput('pr_summary'), false);

  const ctx = github.context;
  if (ctx.eventName !== 'pull_request' && ctx.eventName !== 'pull_request_target') {
    core.info(`Skipping: event ${ctx.eventName} not supported.`);
    return;
  }

  const pr = ctx.payload.pull_request;
  if (!pr) throw new Error('No pull_request in context payload');

  const ref: PrRef = { ...ctx.repo, prNumber: pr.number };
  const octokit = github.getOctokit(ghToken);

  const diff = await fetchPrDiff(octokit, ref);
  const packed = packUnifiedDiff(diff, { maxFiles, maxTotalChars });
  if (!packed.selectedFiles.length) {
    core.info('No files selected for review.');
    return;
  }

  const knownFilePaths = extractDiffFilePaths(packed.text);
  const cache = new ClientCache(backendFactory(config.backendSettings));
  const orchestrator = new Orchestrator({
    cache,
    backend: config.backend,
    temperature: config.temperature,
    enabled: config.agents,
    timeoutMs: config.timeoutMs,
    maxRetries: config.maxRetries,
  });

  const report = await orchestrator.reviewCycle(packed.text, {
    diffOnly: true,
    parallel: config.parallel,
    primaryFilePath: knownFilePaths[0] ?? DEFAULT_PRIMARY_PATH,
    knownFilePaths,
  });
  core.info(`Review cycle finished in state ${report.state}`);

  const reviewMarkdown = buildReviewMarkdown(report, packed.selectedFiles, packed.truncated);
  await upsertSummaryComment(octokit, ref, reviewMarkdown);

  const headSha: unknown = pr.head?.sha;
  const inlineComments = commentsToInlineComments(report.comments, knownFilePaths);
  if (inline && inlineComments.length && typeof headSha === 'string') {
    await octokit.request('POST /repos/{owner}/{repo}/pulls/{pull_number}/reviews', {
      owner: ref.owner,
      repo: ref.repo,
      pull_number: ref.prNumber,
      commit_id: headSha,
      event: 'COMMENT',
      comments: inlineComments.map((c) => ({ path: c.path, line: c.line, side: 'RIGHT' as const, body: c.body })),
    });
    core.info(`Posted ${inlineComments.length} inline review comments.`);
  }

  let summaryMarkdown = '';
  const fileChanges = summarize ? parseDiffFileChanges(packed.text) : [];
  if (fileChanges.length) {
    const prTitle: unknown = pr.title;
    const summarizer = new PrSummarizer({ cache, backend: config.backend, temperature: config.temperature });
    const summary = await summarizer.summarize(fileChanges, { context: typeof prTitle === 'string' ? prTitle : '' });
    summaryMarkdown = formatSummaryMarkdown(summary);
    core.setOutput('pr_summary', summaryMarkdown);
  }

  const commentsJson = serializeComments(report.comments);
  core.setOutput('review_markdown', reviewMarkdown);
  core.setOutput('review_comments', commentsJson);
  core.setOutput('state', report.state);
  if (report.consolidated) core.setOutput('overall_score', String(report.consolidated.overallScore));

  if (writeFiles) {
    await writeOutputs(outputDir, {
      'review.md': reviewMarkdown,
      'comments.json': commentsJson,
      'diff.txt': packed.text,
      ...(report.consolidated ? { 'report.json': renderConsolidatedJson(report.consolidated, report.comments) } : {}),
      ...(summaryMarkdown ? { 'summary.md': summaryMarkdown } : {}),
    });
  }

  await core.summary
    .addHeading('Review Panel')
    .addRaw(`Backend: ${config.backend}\n\nReviewed files: ${packed.selectedFiles.length}\n\nState: ${report.state}\n`)
    .addRaw(writeFiles ? `\nWrote outputs to: ${outputDir}\n` : '')
    .addRaw(summaryMarkdown ? `\n${summaryMarkdown}\n` : '')
    .write();
}

run().catch((err: unknown) => {
  core.setFailed(err instanceof Error ? (err.stack ?? err.message) : errorMessage(err));
});
