import * as core from '@actions/core';

import type { ClientCache } from '../lib/client-cache.js';
import { ConfigurationError, errorMessage } from '../lib/errors.js';
import type { FileChange } from '../lib/file-changes.js';
import type { BackendKind } from '../lib/llm.js';

export type PrSummary = {
  title: string;
  description: string;
  changesOverview: string;
  filesChanged: number;
  totalAdditions: number;
  totalDeletions: number;
  fileChanges: readonly FileChange[];
  keyChanges: string[];
  potentialImpacts: string[];
  testingRecommendations: string[];
  breakingChanges: string[];
  securityConsiderations: string[];
  diagrams: string[];
};

export type SummarizerOptions = {
  cache: ClientCache;
  backend: BackendKind;
  temperature?: number;
};

export type SummarizeOptions = {
  context?: string;
  diagrams?: boolean;
};

type SectionPrompt = {
  system: string;
  ask: string;
  contextChars: number;
  maxTokens: number;
};

type TextSection = SectionPrompt & { fallback: string };
type ListSection = SectionPrompt & { fallback: readonly string[]; allowNone?: boolean };

const BULLETS = 'Return only bullet points starting with "-".';
const NONE_OR_BULLETS = 'If there are none, return "None identified". Otherwise return bullet points starting with "-".';

export const TEXT_SECTIONS = {
  title: {
    system:
      'You write pull request titles. In 8 to 12 words, name the capability or improvement the change delivers rather than its technical details.',
    ask: 'Write a title for these code changes:',
    contextChars: 2000,
    maxTokens: 150,
    fallback: 'Important system improvements',
  },
  description: {
    system:
      'You explain code changes to stakeholders. In 2 to 3 sentences without jargon, say what problem was solved or what the change makes possible.',
    ask: 'Describe what these changes do and why they are valuable:',
    contextChars: 4000,
    maxTokens: 300,
    fallback: 'Important improvements have been implemented.',
  },
  changesOverview: {
    system:
      'You are a technical lead telling the team why a change matters for the system, its users or the business. Answer in 1 to 2 sentences.',
    ask: 'Explain why these changes matter:',
    contextChars: 3000,
    maxTokens: 250,
    fallback: 'These changes bring significant improvements to the system.',
  },
} satisfies Record<string, TextSection>;

export const LIST_SECTIONS = {
  keyChanges: {
    system: `You list the key improvements in a change, one sentence each, saying why each one matters. ${BULLETS}`,
    ask: 'List the key improvements in these changes:',
    contextChars: 4000,
    maxTokens: 400,
    fallback: ['Important system improvements have been implemented'],
  },
  potentialImpacts: {
    system: `You are a senior developer. List the positive and negative impacts these changes may have on the system, users, performance or other components. ${BULLETS}`,
    ask: 'List the potential impacts of these changes:',
    contextChars: 4000,
    maxTokens: 400,
    fallback: ['Impact analysis needed'],
  },
  testingRecommendations: {
    system: `You are a QA engineer. Recommend test cases and areas that need verification for these changes. ${BULLETS}`,
    ask: 'Recommend how to test these changes:',
    contextChars: 4000,
    maxTokens: 400,
    fallback: ['Test the modified functionality'],
  },
  breakingChanges: {
    system: `You check changes for anything that breaks existing users, APIs or integrations. ${NONE_OR_BULLETS}`,
    ask: 'Identify breaking changes in this diff:',
    contextChars: 4000,
    maxTokens: 300,
    fallback: [],
    allowNone: true,
  },
  securityConsiderations: {
    system: `You are a security expert. List security implications of these changes, both new risks and improvements. ${NONE_OR_BULLETS}`,
    ask: 'Analyze the security implications of these changes:',
    contextChars: 4000,
    maxTokens: 300,
    fallback: [],
    allowNone: true,
  },
} satisfies Record<string, ListSection>;

export const NO_DIAGRAMS = 'NO_DIAGRAMS_NEEDED';
export const DIAGRAM_TEMPERATURE = 0.3;

const DIAGRAM_PROMPT: SectionPrompt = {
  system: [
    'You draw Mermaid diagrams that help reviewers understand a code change:',
    'architecture, data flow, process flow or component relationships.',
    'Use flowchart TD or flowchart LR, sequenceDiagram, classDiagram or erDiagram.',
    'Keep node labels to plain words without parentheses or pipes, and put a bold',
    'descriptive label before each ```mermaid block. Return only the labelled diagrams.',
    `If no diagram would help, return exactly ${NO_DIAGRAMS}.`,
  ].join('\n'),
  ask: 'Draw diagrams for these changes if they would help:',
  contextChars: 8000,
  maxTokens: 800,
};

const MAX_FILES_PER_STATUS = 10;
const MAX_DIFF_FILES = 5;
const DIFF_HEAD_LINES = 25;

function clip(lines: string[]): string[] {
  if (lines.length <= DIFF_HEAD_LINES * 2) return lines;
  return [
    ...lines.slice(0, DIFF_HEAD_LINES),
    `... (${lines.length - DIFF_HEAD_LINES * 2} more lines) ...`,
    ...lines.slice(-DIFF_HEAD_LINES),
  ];
}

/**
 * Shared prompt context: files grouped by status, then the hunks of the first
 * few files with long diffs cut down to their head and tail.
 */
export function buildSummaryContext(changes: readonly FileChange[], additionalContext = ''): string {
  const parts = ['FILE CHANGES SUMMARY:', `Total files changed: ${changes.length}`];

  const byStatus = new Map<string, FileChange[]>();
  for (const c of changes) {
    const group = byStatus.get(c.status) ?? [];
    group.push(c);
    byStatus.set(c.status, group);
  }

  for (const [status, files] of byStatus) {
    parts.push(`\n${status.toUpperCase()} FILES (${files.length}):`);
    for (const f of files.slice(0, MAX_FILES_PER_STATUS)) {
      parts.push(`  - ${f.filename} (+${f.additions}/-${f.deletions})`);
      if (f.language) parts.push(`    Language: ${f.language}`);
    }
  }

  parts.push('\nKEY DIFF CONTENT:');
  for (const f of changes.slice(0, MAX_DIFF_FILES)) {
    if (!f.diffContent) continue;
    parts.push(`\n--- ${f.filename} ---`);
    parts.push(...clip(f.diffContent.split('\n')));
  }

  if (additionalContext) parts.push(`\nADDITIONAL CONTEXT:\n${additionalContext}`);
  return parts.join('\n');
}

export function parseBulletList(reply: string): string[] {
  return reply
    .split('\n')
    .map((l) => l.trim())
    .filter((l) => l.startsWith('-'))
    .map((l) => l.replace(/^[-\s]+|[-\s]+$/g, ''))
    .filter(Boolean);
}

function buildDiagramContext(summary: Omit<PrSummary, 'diagrams'>): string {
  const parts = ['FILES CHANGED:'];
  for (const f of summary.fileChanges) {
    parts.push(`- ${f.filename} (${f.status}): +${f.additions}/-${f.deletions}`);
    if (f.diffContent) {
      const sample = f.diffContent.length > 500 ? `${f.diffContent.slice(0, 500)}...` : f.diffContent;
      parts.push(`  Diff sample: ${sample}`);
    }
  }
  parts.push('\nKEY CHANGES:');
  for (const k of summary.keyChanges) parts.push(`- ${k}`);
  return parts.join('\n');
}

/**
 * Writes a pull request summary from parsed file changes. Each section is
 * its own backend call; a section whose call fails gets a fixed fallback.
 */
export class PrSummarizer {
  readonly temperature: number;

  constructor(private readonly opts: SummarizerOptions) {
    this.temperature = opts.temperature ?? 0.1;
  }

  async summarize(changes: readonly FileChange[], opts: SummarizeOptions = {}): Promise<PrSummary> {
    if (!changes.length) throw new Error('No file changes to summarize');

    const context = buildSummaryContext(changes, opts.context);
    core.info(`Summarizing ${changes.length} changed file(s)`);

    const [title, description, changesOverview, keyChanges, potentialImpacts, testingRecommendations, breakingChanges, securityConsiderations] =
      await Promise.all([
        this.text('title', context),
        this.text('description', context),
        this.text('changesOverview', context),
        this.list('keyChanges', context),
        this.list('potentialImpacts', context),
        this.list('testingRecommendations', context),
        this.list('breakingChanges', context),
        this.list('securityConsiderations', context),
      ]);

    const summary = {
      title,
      description,
      changesOverview,
      filesChanged: changes.length,
      totalAdditions: changes.reduce((n, c) => n + c.additions, 0),
      totalDeletions: changes.reduce((n, c) => n + c.deletions, 0),
      fileChanges: Object.freeze([...changes]),
      keyChanges,
      potentialImpacts,
      testingRecommendations,
      breakingChanges,
      securityConsiderations,
    };

    return Object.freeze({ ...summary, diagrams: opts.diagrams ? await this.diagrams(summary) : [] });
  }

  private async text(section: keyof typeof TEXT_SECTIONS, context: string): Promise<string> {
    const spec: TextSection = TEXT_SECTIONS[section];
    const reply = await this.ask(section, spec, context, this.temperature);
    return reply?.trim() || spec.fallback;
  }

  private async list(section: keyof typeof LIST_SECTIONS, context: string): Promise<string[]> {
    const spec: ListSection = LIST_SECTIONS[section];
    const reply = await this.ask(section, spec, context, this.temperature);
    if (!reply?.trim()) return [...spec.fallback];
    if (spec.allowNone && reply.toLowerCase().includes('none identified')) return [];
    return parseBulletList(reply);
  }

  private async diagrams(summary: Omit<PrSummary, 'diagrams'>): Promise<string[]> {
    const reply = await this.ask('diagrams', DIAGRAM_PROMPT, buildDiagramContext(summary), DIAGRAM_TEMPERATURE);
    const text = reply?.trim() ?? '';
    if (!text || text === NO_DIAGRAMS) return [];
    return text.split('\n');
  }

  // Null when the backend fails; missing configuration still throws.
  private async ask(label: string, prompt: SectionPrompt, context: string, temperature: number): Promise<string | null> {
    try {
      const client = await this.opts.cache.acquire('pr_summary_agent', this.opts.backend, temperature);
      return await client.complete({
        systemPrompt: prompt.system,
        userPrompt: `${prompt.ask}\n\n${context.slice(0, prompt.contextChars)}`,
        temperature,
        maxTokens: prompt.maxTokens,
      });
    } catch (e) {
      if (e instanceof ConfigurationError) throw e;
      core.warning(`PR summary ${label} failed: ${errorMessage(e)}`);
      return null;
    }
  }
}

export function formatSummaryMarkdown(summary: PrSummary): string {
  const lines = [`# ${summary.title}`, '', '## What Changed', summary.description, '', '## Why It Matters', summary.changesOverview, ''];

  if (summary.diagrams.length) lines.push('## Architecture Overview', ...summary.diagrams, '');
  if (summary.keyChanges.length) lines.push('## Key Improvements', ...summary.keyChanges.map((k) => `- ${k}`), '');

  return lines.join('\n');
}

function textList(heading: string, items: readonly string[]): string[] {
  return items.length ? [`${heading}:`, ...items.map((i) => `  - ${i}`), ''] : [];
}

export function formatSummaryText(summary: PrSummary): string {
  const title = `TITLE: ${summary.title}`;
  const lines = [
    title,
    '='.repeat(title.length),
    '',
    'DESCRIPTION:',
    summary.description,
    '',
    'CHANGES OVERVIEW:',
    summary.changesOverview,
    '',
    'STATISTICS:',
    `  Files changed: ${summary.filesChanged}`,
    `  Lines added: ${summary.totalAdditions}`,
    `  Lines deleted: ${summary.totalDeletions}`,
    '',
    ...textList('KEY CHANGES', summary.keyChanges),
    ...textList('POTENTIAL IMPACTS', summary.potentialImpacts),
    ...textList('BREAKING CHANGES', summary.breakingChanges),
    ...textList('SECURITY CONSIDERATIONS', summary.securityConsiderations),
    ...textList('TESTING RECOMMENDATIONS', summary.testingRecommendations),
    'FILES CHANGED:',
  ];

  for (const f of summary.fileChanges) {
    lines.push(`  - ${f.filename} (${f.status}) +${f.additions}/-${f.deletions}`);
    if (f.oldFilename) lines.push(`    Renamed from: ${f.oldFilename}`);
  }
  return lines.join('\n');
}

export function renderSummaryJson(summary: PrSummary): string {
  return JSON.stringify(
    {
      title: summary.title,
      description: summary.description,
      changes_overview: summary.changesOverview,
      files_changed: summary.filesChanged,
      total_additions: summary.totalAdditions,
      total_deletions: summary.totalDeletions,
      file_changes: summary.fileChanges.map((f) => ({
        filename: f.filename,
        status: f.status,
        additions: f.additions,
        deletions: f.deletions,
        old_filename: f.oldFilename ?? null,
        diff_content: f.diffContent,
        language: f.language ?? null,
      })),
      key_changes: summary.keyChanges,
      potential_impacts: summary.potentialImpacts,
      testing_recommendations: summary.testingRecommendations,
      breaking_changes: summary.breakingChanges,
      security_considerations: summary.securityConsiderations,
      diagrams: summary.diagrams,
    },
    null,
    2
  );
}
