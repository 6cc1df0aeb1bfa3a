import { Inject, Injectable, Logger } from '@nestjs/common';
import { spawn } from 'node:child_process';
import { rolloutConfig, RolloutConfig } from '../config/rollout.config';
import { truncateOutput } from '../execution/command-outcome';
import { FinishedCommand, RemoteCommandRecord } from '../queue/remote-command-queue.service';

function createLineBuffer(onLine: (line: string) => void) {
  let buffer = '';

  return {
    write(chunk: string) {
      buffer += chunk;

      // Split into complete lines; keep the last partial line in buffer.
      const parts = buffer.split(/\r?\n/);
      buffer = parts.pop() ?? '';

      for (const part of parts) {
        onLine(part);
      }
    },
    flush() {
      const remaining = buffer;
      buffer = '';
      if (remaining.length > 0) onLine(remaining);
    },
  };
}

/** Interleaved stdout/stderr lines, keeping roughly the last maxBytes. */
function createOutputCollector(maxBytes: number) {
  let text = '';
  let dropped = false;

  return {
    append(line: string) {
      text += `${line}\n`;
      if (text.length > maxBytes * 2) {
        const capped = truncateOutput(text, maxBytes);
        text = capped.output;
        dropped = dropped || capped.truncated;
      }
    },
    result(): { output: string; truncated: boolean } {
      const capped = truncateOutput(text, maxBytes);
      return { output: capped.output, truncated: dropped || capped.truncated };
    },
  };
}

/**
 * Runs one claimed command script under /bin/sh on this machine.
 * The script gets its own process group so a deadline kill also takes its children.
 */
@Injectable()
export class CommandExecutorService {
  private readonly logger = new Logger(CommandExecutorService.name);

  constructor(@Inject(rolloutConfig.KEY) private readonly config: RolloutConfig) {}

  async execute(
    command: Pick<RemoteCommandRecord, 'id' | 'template' | 'body' | 'timeout_ms'>,
  ): Promise<FinishedCommand> {
    const output = createOutputCollector(this.config.maxOutputBytes);
    const collect = (line: string) => {
      output.append(line);
      this.logger.debug(`[${command.template}] ${line}`);
    };

    return new Promise<FinishedCommand>((resolve) => {
      let settled = false;
      let timedOut = false;

      const child = spawn(command.body, {
        shell: true,
        detached: true,
        env: process.env,
      });

      const stdoutBuffer = createLineBuffer(collect);
      const stderrBuffer = createLineBuffer(collect);

      const timer =
        command.timeout_ms != null && command.timeout_ms > 0
          ? setTimeout(() => {
              timedOut = true;
              this.logger.warn(`command=${command.id} exceeded ${command.timeout_ms}ms; killing`);
              try {
                if (child.pid != null) process.kill(-child.pid, 'SIGKILL');
              } catch {
                child.kill('SIGKILL');
              }
            }, command.timeout_ms)
          : null;

      const settle = (result: FinishedCommand) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        // Flush any partial line that didn't end in \n
        stdoutBuffer.flush();
        stderrBuffer.flush();
        resolve({ ...result, ...output.result() });
      };

      if (child.stdout) child.stdout.on('data', (buf: Buffer) => stdoutBuffer.write(buf.toString('utf8')));
      if (child.stderr) child.stderr.on('data', (buf: Buffer) => stderrBuffer.write(buf.toString('utf8')));

      child.on('close', (code) => {
        if (timedOut) {
          settle({ status: 'timed_out', exitCode: null, output: '', truncated: false });
          return;
        }
        const exitCode = code ?? 1;
        settle({ status: exitCode === 0 ? 'success' : 'failed', exitCode, output: '', truncated: false });
      });
      child.on('error', (err) => {
        collect(`Execution error: ${err.message}`);
        settle({ status: 'failed', exitCode: 1, output: '', truncated: false });
      });
    });
  }
}
