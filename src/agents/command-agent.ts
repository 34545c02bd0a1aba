/**
 * Step callback backed by an external command.
 *
 * Each agent call spawns the configured command, writes the rendered prompt
 * to its stdin and resolves with everything it printed to stdout. The agent
 * handle travels in environment variables so one script can serve several
 * agents and sessions. A non-zero exit is a step failure carrying stderr.
 */

import { spawn } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';
import type { AgentHandle, StepCallback } from '../workflow-runtime/types.js';
import { StepExecutionError } from '../workflow-runtime/errors.js';

/** The part of a child process the agent needs; lets tests supply a fake. */
export interface AgentProcess {
  stdin: Writable | null;
  stdout: Readable | null;
  stderr: Readable | null;
  on(event: 'close', listener: (code: number | null) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnAgentProcess = (
  command: string,
  args: readonly string[],
  options: { env: NodeJS.ProcessEnv },
) => AgentProcess;

export interface CommandAgentOptions {
  command: string;
  args?: readonly string[];
  /** Replaces child_process.spawn, mainly for tests */
  spawnFn?: SpawnAgentProcess;
}

const defaultSpawn: SpawnAgentProcess = (command, args, options) =>
  spawn(command, [...args], { env: options.env, stdio: ['pipe', 'pipe', 'pipe'] });

/** Environment variables describing the agent a prompt is meant for. */
export function agentEnvironment(agent: AgentHandle): Record<string, string> {
  return {
    AGENT_NAME: agent.name,
    AGENT_SESSION_KEY: agent.session_key,
    AGENT_MODEL: agent.model ?? '',
    AGENT_CHANNEL: agent.channel,
    AGENT_CHAT_ID: agent.chat_id,
  };
}

export function createCommandAgent(options: CommandAgentOptions): StepCallback {
  const { command } = options;
  const args = options.args ?? [];
  const spawnFn = options.spawnFn ?? defaultSpawn;

  return (agent, prompt, signal) =>
    new Promise<string>((resolve, reject) => {
      if (signal.aborted) {
        reject(new StepExecutionError(`Agent call to "${command}" was aborted`));
        return;
      }

      const child = spawnFn(command, args, {
        env: { ...process.env, ...agentEnvironment(agent) },
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const onAbort = (): void => {
        child.kill('SIGTERM');
      };
      signal.addEventListener('abort', onAbort, { once: true });

      const finish = (fn: () => void): void => {
        if (settled) return;
        settled = true;
        signal.removeEventListener('abort', onAbort);
        fn();
      };

      child.stdout?.on('data', (chunk: Buffer | string) => {
        stdout += chunk.toString();
      });
      child.stderr?.on('data', (chunk: Buffer | string) => {
        stderr += chunk.toString();
      });

      child.on('error', (err) => {
        finish(() =>
          reject(new StepExecutionError(`Failed to start agent command "${command}": ${err.message}`, err)),
        );
      });

      child.on('close', (code) => {
        finish(() => {
          if (code === 0) {
            resolve(stdout);
            return;
          }
          const detail = stderr.trim() ? `: ${stderr.trim()}` : '';
          reject(new StepExecutionError(`Agent command "${command}" exited with code ${code ?? 'null'}${detail}`));
        });
      });

      // A command that exits without reading stdin closes the pipe early
      child.stdin?.on('error', (err) => {
        stderr += `${stderr ? '\n' : ''}stdin: ${err.message}`;
      });
      child.stdin?.end(prompt);
    });
}
