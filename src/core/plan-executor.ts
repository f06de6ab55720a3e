import { spawn } from 'node:child_process';

import type { GroupKind } from './account-class.js';
import type { ToolSettings } from './config.js';
import { ExecutionError } from '../utils/errors.js';

export type PlanInvocation =
  | { type: 'batch'; kind: GroupKind; moduleName: string }
  | { type: 'target'; kind: GroupKind; target: string };

/**
 * Runs one plan invocation and resolves with its captured stdout. Rejects
 * with an ExecutionError when the process cannot start or exits non-zero.
 */
export interface PlanExecutor {
  plan(invocation: PlanInvocation): Promise<string>;
}

const STDERR_EXCERPT_LIMIT = 2000;

export function buildPlanArgs(invocation: PlanInvocation, tools: ToolSettings): string[] {
  if (invocation.type === 'target') {
    return ['tg', 'plan', '--wd', invocation.target, '--local', '--pr'];
  }

  const args = ['tg', 'plan_all', '-m', invocation.moduleName];
  if (invocation.kind === 'restricted') {
    args.push(
      '--organizations',
      tools.restrictedOrganizations,
      '--regions',
      tools.restrictedRegions,
    );
  }
  args.push('--local', '--pr');
  return args;
}

export class CommandPlanExecutor implements PlanExecutor {
  private readonly tools: ToolSettings;
  private readonly cwd: string;

  constructor(tools: ToolSettings, cwd: string) {
    this.tools = tools;
    this.cwd = cwd;
  }

  plan(invocation: PlanInvocation): Promise<string> {
    const args = buildPlanArgs(invocation, this.tools);
    const target = invocation.type === 'target' ? invocation.target : null;
    const commandLine = `${this.tools.executor} ${args.join(' ')}`;

    return new Promise((resolve, reject) => {
      const child = spawn(this.tools.executor, args, {
        cwd: this.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        env: { ...process.env },
      });

      const stdout: Buffer[] = [];
      let stderr = '';

      child.stdout.on('data', (chunk: Buffer) => {
        stdout.push(chunk);
      });

      child.stderr.on('data', (chunk: Buffer) => {
        if (stderr.length < STDERR_EXCERPT_LIMIT) {
          stderr += chunk.toString();
        }
      });

      child.on('close', (code) => {
        if (code !== 0) {
          const excerpt = stderr.trim().slice(0, STDERR_EXCERPT_LIMIT);
          const detail = excerpt ? `: ${excerpt}` : '';
          reject(
            new ExecutionError(target, `${commandLine} exited with code ${code}${detail}`, {
              exitCode: code,
              stderr: excerpt,
            }),
          );
          return;
        }
        resolve(Buffer.concat(stdout).toString('utf-8'));
      });

      child.on('error', (err) => {
        reject(new ExecutionError(target, `failed to spawn ${this.tools.executor}: ${err.message}`));
      });
    });
  }
}
