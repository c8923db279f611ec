import crossSpawn from 'cross-spawn';

export interface ProcessOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number;
}

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export class ProcessUtils {
  /**
   * Runs `command` to completion and collects its output. Rejects only when the process cannot be
   * started or exceeds `timeout`; a non-zero exit code is reported in the result.
   */
  static async execute(
    command: string,
    args: string[] = [],
    options: ProcessOptions = {}
  ): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const child = crossSpawn(command, args, {
        cwd: options.cwd || process.cwd(),
        env: { ...process.env, ...options.env },
        stdio: 'pipe',
      });

      let stdout = '';
      let stderr = '';
      let timer: NodeJS.Timeout | undefined;

      if (options.timeout) {
        timer = setTimeout(() => {
          child.kill();
          reject(new Error(`Process timed out after ${options.timeout}ms: ${command}`));
        }, options.timeout);
      }

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code: number | null) => {
        if (timer) clearTimeout(timer);
        resolve({
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          exitCode: code ?? 1,
        });
      });

      child.on('error', (error: Error) => {
        if (timer) clearTimeout(timer);
        reject(new Error(`Process execution failed: ${error.message}`));
      });
    });
  }
}
