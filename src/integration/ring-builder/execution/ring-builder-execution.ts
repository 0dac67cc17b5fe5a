// SPDX-License-Identifier: Apache-2.0

import {spawn} from 'node:child_process';
import {RingBuilderExecutionException} from '../ring-builder-execution-exception.js';
import {MissingArgumentError} from '../../../core/errors/missing-argument-error.js';

/**
 * Represents one run of the ring-builder executable. The process is started when the instance is created.
 */
export class RingBuilderExecution {
  private readonly output: string[] = [];
  private readonly errOutput: string[] = [];
  private exitCodeValue: number | null = null;
  private readonly completion: Promise<number>;

  /**
   * Creates a new RingBuilderExecution instance.
   * @param command The command array to execute, the executable first
   * @param workingDirectory The working directory for the process
   * @param environmentVariables The environment variables to set
   */
  public constructor(
    private readonly command: string[],
    workingDirectory: string,
    environmentVariables: Record<string, string>,
  ) {
    if (command.length === 0) {
      throw new MissingArgumentError('command must not be empty');
    }
    const [executable, ...arguments_] = command;

    this.completion = new Promise<number>((resolve, reject) => {
      const child = spawn(executable, arguments_, {
        cwd: workingDirectory,
        env: {...process.env, ...environmentVariables},
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      child.stdout.on('data', (chunk: Buffer) => this.output.push(chunk.toString()));
      child.stderr.on('data', (chunk: Buffer) => this.errOutput.push(chunk.toString()));

      child.on('error', error => {
        reject(
          new RingBuilderExecutionException(
            -1,
            `Failed to run ${executable}: ${error.message}`,
            this.standardOutput(),
            this.standardError(),
            error,
          ),
        );
      });

      child.on('close', code => {
        this.exitCodeValue = code ?? -1;
        resolve(this.exitCodeValue);
      });
    });
  }

  /**
   * Waits for the process to complete.
   * @returns the exit code of the process
   * @throws RingBuilderExecutionException if the process could not be started
   */
  public async waitFor(): Promise<number> {
    return this.completion;
  }

  /**
   * Waits for the process to complete and requires it to succeed.
   * @throws RingBuilderExecutionException if the process exits with a non-zero code
   */
  public async call(): Promise<void> {
    const exitCode: number = await this.waitFor();
    if (exitCode !== 0) {
      throw new RingBuilderExecutionException(
        exitCode,
        `Process exited with code ${exitCode}: ${this.commandLine()}`,
        this.standardOutput(),
        this.standardError(),
      );
    }
  }

  /**
   * Gets the exit code of the process.
   * @returns The exit code or null if the process hasn't completed
   */
  public exitCode(): number | null {
    return this.exitCodeValue;
  }

  public standardOutput(): string {
    return this.output.join('').trim();
  }

  public standardError(): string {
    return this.errOutput.join('').trim();
  }

  public commandLine(): string {
    return this.command.join(' ');
  }
}
