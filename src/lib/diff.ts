import { execSync } from 'node:child_process';

export type DiffOptions = {
  cwd: string;
  baseRef?: string; // e.g. origin/main
  headRef?: string; // e.g. HEAD
  maxChars?: number; // hard cap
};

// Assumes the base ref has been fetched (git fetch origin main).
export function getGitDiff({ cwd, baseRef = 'origin/main', headRef = 'HEAD', maxChars = 120_000 }: DiffOptions): string {
  return execDiff(cwd, `git diff --no-color ${baseRef}...${headRef}`, maxChars);
}

export function getStagedDiff({ cwd, maxChars = 120_000 }: Pick<DiffOptions, 'cwd' | 'maxChars'>): string {
  return execDiff(cwd, 'git diff --no-color --cached', maxChars);
}

function execDiff(cwd: string, cmd: string, maxChars: number): string {
  const out = execSync(cmd, { cwd, encoding: 'utf8', stdio: ['ignore', 'pipe', 'pipe'] });
  if (out.length > maxChars) return out.slice(0, maxChars) + '\n\n[diff truncated]\n';
  return out;
}
