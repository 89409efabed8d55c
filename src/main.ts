import { loadConfig } from './config/index.js';
import { configureLogger, createLogger } from './utils/logger.js';
import { JournalExportError } from './utils/errors.js';
import { JournalFileReader } from './adapters/journal/JournalFileReader.js';
import { PandocAdapter } from './adapters/pandoc/PandocAdapter.js';
import { TimeTree } from './core/timeTree/TimeTree.js';
import { OrgRenderer, type OutputSink } from './core/render/OrgRenderer.js';

/**
 * Run one conversion. Every failure ends here: it is logged and turned into exit status 1.
 */
export async function main(
  args: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  output: OutputSink = process.stdout
): Promise<number> {
  try {
    const config = loadConfig(env);
    // Loggers are only created after this point, so they all use the validated level
    configureLogger(config.logLevel);
    const logger = createLogger({ component: 'main' });

    const journalPath = args[0] ?? config.journalPath;
    logger.info({ journalPath }, 'Converting journal export to Org');

    const journal = await new JournalFileReader().read(journalPath);

    // Build the whole tree before any output is written
    const tree = TimeTree.build(journal);

    const renderer = new OrgRenderer(new PandocAdapter(config), {
      headingShift: config.headingShift,
      imagesDir: config.imagesDir,
    });
    await renderer.render(tree, output);
    return 0;
  } catch (error) {
    const code = error instanceof JournalExportError ? error.code : 'UNEXPECTED';
    createLogger({ component: 'main' }).fatal({ error, code }, 'Conversion aborted');
    return 1;
  }
}
