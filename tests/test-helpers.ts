import { mkdtemp, realpath, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { FileEntry, PackageConfig, Specification } from '../src/types/index.js';
import type { ExecutionContext } from '../src/types/execution-context.js';
import type { OutputPort, UnifiedSpinner } from '../src/core/ports/output.js';
import type { PromptChoice, PromptPort } from '../src/core/ports/prompt.js';
import type { CommandInvocation, CommandOutcome, CommandRunner } from '../src/core/ports/command-runner.js';
import { writeArchive } from '../src/core/archive/archive-reader.js';

export const TEST_INTERPRETER = '/opt/test/bin/node';
export const TEST_LOADER = 'packstead/loader';

export async function makeTempDir(prefix: string): Promise<string> {
  return realpath(await mkdtemp(join(tmpdir(), `packstead-${prefix}-`)));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function makeSpec(overrides: Partial<Specification> & Pick<Specification, 'name' | 'version'>): Specification {
  return {
    dependencies: [],
    executables: [],
    extensions: [],
    requirePaths: ['lib'],
    ...overrides
  };
}

export function fileEntry(relativePath: string, content: string, mode: number = 0o644): FileEntry {
  return { relativePath, mode, content: Buffer.from(content, 'utf8') };
}

export function makeConfig(root: string, overrides: Partial<PackageConfig> = {}): PackageConfig {
  return {
    installDir: join(root, 'install'),
    bindir: join(root, 'bin'),
    sitelibdir: join(root, 'site_lib'),
    interpreter: TEST_INTERPRETER,
    loaderModule: TEST_LOADER,
    makeProgram: 'make',
    installPathMode: 'arguments',
    ...overrides
  };
}

export interface OutputRecord {
  level: 'info' | 'step' | 'message' | 'success' | 'error' | 'warn' | 'note' | 'spinner';
  text: string;
}

export interface RecordingOutput extends OutputPort {
  records: OutputRecord[];
  textsOf(level: OutputRecord['level']): string[];
}

export function createRecordingOutput(): RecordingOutput {
  const records: OutputRecord[] = [];
  const push = (level: OutputRecord['level']) => (text: string): void => {
    records.push({ level, text });
  };

  return {
    records,
    textsOf(level) {
      return records.filter(r => r.level === level).map(r => r.text);
    },
    info: push('info'),
    step: push('step'),
    message: push('message'),
    success: push('success'),
    error: push('error'),
    warn: push('warn'),
    note(content: string, title?: string) {
      records.push({ level: 'note', text: title ? `${title}\n${content}` : content });
    },
    spinner(): UnifiedSpinner {
      return {
        start: push('spinner'),
        stop(finalMessage?: string) {
          if (finalMessage) records.push({ level: 'spinner', text: finalMessage });
        },
        message: push('spinner')
      };
    }
  };
}

export interface ScriptedPrompt extends PromptPort {
  /** Every question asked, in order */
  asked: string[];
  /** Titles offered by the last select */
  lastChoices: string[];
}

/**
 * Prompt answering from fixed scripts. Running out of answers fails the test.
 */
export function createScriptedPrompt(script: {
  confirm?: boolean[];
  select?: Array<number | Error>;
} = {}): ScriptedPrompt {
  const confirms = [...(script.confirm ?? [])];
  const selects = [...(script.select ?? [])];
  const prompt: ScriptedPrompt = {
    asked: [],
    lastChoices: [],
    async confirm(message: string): Promise<boolean> {
      prompt.asked.push(message);
      const answer = confirms.shift();
      if (answer === undefined) {
        throw new Error(`Unexpected confirm: ${message}`);
      }
      return answer;
    },
    async select<T>(message: string, choices: Array<PromptChoice<T>>): Promise<T> {
      prompt.asked.push(message);
      prompt.lastChoices = choices.map(c => c.title);
      const answer = selects.shift();
      if (answer === undefined) {
        throw new Error(`Unexpected select: ${message}`);
      }
      if (answer instanceof Error) {
        throw answer;
      }
      const choice = choices.at(answer);
      if (choice === undefined) {
        throw new Error(`Scripted answer ${answer} is outside the ${choices.length} choices`);
      }
      return choice.value;
    }
  };
  return prompt;
}

export type RunHandler = (invocation: CommandInvocation) => Promise<Partial<CommandOutcome>> | Partial<CommandOutcome>;

export interface RecordingRunner extends CommandRunner {
  invocations: CommandInvocation[];
}

/**
 * CommandRunner that records invocations and lets the test decide the outcome.
 * Default outcome: exit 0, no output.
 */
export function createRecordingRunner(handler?: RunHandler): RecordingRunner {
  const runner: RecordingRunner = {
    invocations: [],
    async run(invocation: CommandInvocation): Promise<CommandOutcome> {
      runner.invocations.push(invocation);
      const outcome = handler ? await handler(invocation) : {};
      return { exitCode: 0, output: '', ...outcome };
    }
  };
  return runner;
}

export function makeContext(root: string, overrides: Partial<ExecutionContext> = {}): ExecutionContext {
  return {
    sourceCwd: root,
    config: makeConfig(root),
    interactive: false,
    output: createRecordingOutput(),
    prompt: createScriptedPrompt(),
    runner: createRecordingRunner(),
    ...overrides
  };
}

/**
 * Write a `.pkg` archive for `spec` into `dir` and return its path
 */
export async function writeTestArchive(
  dir: string,
  spec: Specification,
  files: FileEntry[],
  fileName: string = `${spec.name}-${spec.version}.pkg`
): Promise<string> {
  const archivePath = join(dir, fileName);
  await writeArchive(archivePath, spec, files);
  return archivePath;
}
