import { spawn } from 'child_process';
import type { HookFactory, ResolvedValue, Stack } from '../types/index.js';
import { InvalidHookArgumentError } from '../core/errors.js';
import { defineHook } from './hook.js';

interface CommandSpec {
  command: string;
  shell: string | true;
}

const parseArgument = (argument: ResolvedValue | undefined): CommandSpec => {
  if (typeof argument === 'string' && argument !== '') {
    return { command: argument, shell: true };
  }

  if (
    argument !== null &&
    typeof argument === 'object' &&
    !Array.isArray(argument) &&
    Object.keys(argument).sort().join(',') === 'command,shell'
  ) {
    const { command, shell } = argument;
    if (typeof command === 'string' && typeof shell === 'string') {
      return { command, shell };
    }
  }

  throw new InvalidHookArgumentError(
    'A cmd hook requires either a string argument or an object with `command` and ' +
      `\`shell\` keys with string values. You gave \`${JSON.stringify(argument)}\`.`
  );
};

const environmentFor = (stack: Stack): NodeJS.ProcessEnv => ({
  ...process.env,
  STACKPILOT_STACK_ID: stack.stackId,
  STACKPILOT_STACK_NAME: stack.externalName,
  ...(stack.region ? { STACKPILOT_REGION: stack.region } : {}),
  ...(stack.profile ? { STACKPILOT_PROFILE: stack.profile } : {}),
});

/**
 * `!cmd "make assets"` or `!cmd {command: ..., shell: /bin/bash}` - runs a
 * shell command; a non-zero exit fails the hook
 */
export const cmd: HookFactory = (argument) =>
  defineHook({
    tag: 'cmd',
    argument,
    run: ({ argument: resolved, context }) => {
      const { command, shell } = parseArgument(resolved);

      return new Promise<void>((resolve, reject) => {
        const child = spawn(command, {
          shell,
          env: environmentFor(context.stack),
          stdio: ['ignore', 'pipe', 'pipe'],
        });

        child.stdout?.on('data', (data: Buffer) => {
          context.logger.info(data.toString().trimEnd());
        });

        child.stderr?.on('data', (data: Buffer) => {
          context.logger.warn(data.toString().trimEnd());
        });

        child.on('error', reject);

        child.on('close', (code) => {
          if (code === 0) {
            resolve();
          } else {
            reject(new Error(`Command '${command}' exited with code ${code}`));
          }
        });
      });
    },
  });
