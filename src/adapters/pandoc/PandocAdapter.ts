import { spawn } from 'node:child_process';
import type { ConversionOptions, TextConverterPort } from '../../ports/TextConverterPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { ConversionError } from '../../utils/errors.js';

export function buildPandocArgs(options: ConversionOptions): string[] {
  return [
    '-f',
    options.from,
    '-t',
    options.to,
    `--shift-heading-level-by=${options.shiftHeadingLevelBy}`,
  ];
}

export class PandocAdapter implements TextConverterPort {
  private readonly logger = createLogger({ adapter: 'PandocAdapter' });
  private readonly pandocPath: string;

  constructor(config: Pick<Config, 'pandocPath'>) {
    this.pandocPath = config.pandocPath;
  }

  convert(text: string, options: ConversionOptions): Promise<string> {
    const args = buildPandocArgs(options);
    const logger = this.logger.child({ method: 'convert', args });
    logger.debug({ inputLength: text.length }, 'Running pandoc');

    return new Promise<string>((resolve, reject) => {
      const child = spawn(this.pandocPath, args);
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;

      const fail = (error: ConversionError): void => {
        if (settled) return;
        settled = true;
        logger.error({ error }, 'pandoc conversion failed');
        reject(error);
      };

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (error) => {
        fail(new ConversionError(`Failed to start ${this.pandocPath}`, {}, { cause: error }));
      });

      // A converter that exits before reading its input closes the pipe under us
      child.stdin.on('error', (error) => {
        fail(
          new ConversionError(`Failed to write input to ${this.pandocPath}`, {}, { cause: error })
        );
      });

      child.on('close', (code, signal) => {
        const errorOutput = Buffer.concat(stderr).toString('utf8');
        if (code !== 0) {
          const reason = signal ? `was killed by ${signal}` : `exited with code ${code}`;
          fail(
            new ConversionError(`${this.pandocPath} ${reason}`, {
              exitCode: code,
              stderr: errorOutput,
            })
          );
          return;
        }
        if (settled) return;
        settled = true;
        const output = Buffer.concat(stdout).toString('utf8');
        logger.debug({ outputLength: output.length }, 'pandoc conversion finished');
        resolve(output);
      });

      child.stdin.end(text, 'utf8');
    });
  }
}
