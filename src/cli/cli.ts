/**
 * roffsmith CLI
 *
 * Commands:
 *   roffsmith render <page.json> [--output <path>] [--check] [--no-apostrophes] [--strip-newlines]
 *   roffsmith config get [key]
 *   roffsmith config set <key> <value>
 *   roffsmith config validate
 *   roffsmith config reset
 */

import path from 'path';
import { Command } from 'commander';
import { ConfigManager } from '../config/config.js';
import type { RoffsmithConfig } from '../config/config.js';
import { loadPageSpec } from '../page/load.js';
import { buildManpage } from '../page/build.js';
import type { PageSpec } from '../page/page-spec.js';
import { sectionNumber } from '../man/section.js';
import { PageSpecError } from '../errors/roff-error.js';
import type { RenderOptions } from '../renderer/roff-renderer.js';
import { writeUpdated, isOutdated } from '../output/write-updated.js';
import { OutputFormatter } from './formatter.js';
import type { RenderSummary } from './formatter.js';
import { ProgressReporter } from './progress.js';

export const VERSION = '0.3.0';

interface RenderCommandOptions {
  output?: string;
  check?: boolean;
  /** commander sets this to false for --no-apostrophes */
  apostrophes: boolean;
  stripNewlines?: boolean;
}

const PATH_SEPARATOR = /[\\/]/;

/**
 * Conventional file name for a page: `corrupt.1`
 *
 * @throws PageSpecError when the title or section would leave the output directory
 */
export function defaultFileName(spec: Pick<PageSpec, 'title' | 'section'>): string {
  const name = `${spec.title.toLowerCase()}.${sectionNumber(spec.section)}`;
  if (PATH_SEPARATOR.test(name)) {
    throw new PageSpecError('Page cannot be named after its title', [
      `title and section must not contain path separators, got: "${name}"`,
    ]);
  }
  return name;
}

function countLines(text: string): number {
  return text.split('\n').length - (text.endsWith('\n') ? 1 : 0);
}

export class RoffsmithCLI {
  private readonly program: Command;
  private readonly formatter: OutputFormatter;
  private readonly configManager: ConfigManager;
  private readonly reporter: ProgressReporter;

  constructor(
    configManager: ConfigManager = new ConfigManager(),
    formatter: OutputFormatter = new OutputFormatter(),
    reporter: ProgressReporter = new ProgressReporter()
  ) {
    this.configManager = configManager;
    this.formatter = formatter;
    this.reporter = reporter;
    this.program = this.buildProgram();
  }

  /** Parse argv and execute the matching command. */
  async run(argv: string[]): Promise<void> {
    await this.program.parseAsync(argv);
  }

  // ─── Program builder ──────────────────────────────────────────────────────

  private buildProgram(): Command {
    const program = new Command('roffsmith')
      .version(VERSION, '-V, --version', 'Print version')
      .description('Generate man pages in ROFF format from JSON page descriptions');

    // ── render ─────────────────────────────────────────────────────────────
    program
      .command('render <page>')
      .description('Render a JSON page description to ROFF')
      .option('-o, --output <path>', 'Write to this file (default: stdout, or output.dir from config)')
      .option('--check', 'Exit with an error if the output file is out of date, without writing it')
      .option('--no-apostrophes', 'Leave apostrophes as typed instead of mapping them to \\*(Aq')
      .option('--strip-newlines', 'Join lines inside text into one source line')
      .action(async (page: string, opts: RenderCommandOptions) => {
        try {
          await this.render(page, opts);
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // ── config ─────────────────────────────────────────────────────────────
    const config = program.command('config').description('Manage roffsmith configuration');

    config
      .command('get [key]')
      .description('Show full config or a specific key')
      .action((key?: string) => {
        try {
          const current = this.configManager.loadWithEnvOverrides();
          if (key) {
            const value = ConfigManager.getValue(current, key);
            console.log(value !== undefined ? JSON.stringify(value, null, 2) : `Key not found: ${key}`);
          } else {
            console.log(JSON.stringify(current, null, 2));
          }
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    config
      .command('set <key> <value>')
      .description('Set a configuration key')
      .action((key: string, value: string) => {
        try {
          const next = ConfigManager.setValue(this.configManager.load(), key, value);
          this.configManager.save(next);
          console.log(`✅ Set ${key} = ${value}`);
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    config
      .command('validate')
      .description('Validate the configuration file')
      .action(() => {
        try {
          const { valid, errors } = this.configManager.validateFile();
          console.log(this.formatter.formatConfigErrors(errors));
          if (!valid) process.exitCode = 1;
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    config
      .command('reset')
      .description('Reset configuration to defaults')
      .action(() => {
        try {
          this.configManager.save(ConfigManager.defaults());
          console.log('✅ Configuration reset to defaults');
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    return program;
  }

  // ─── render ───────────────────────────────────────────────────────────────

  private async render(page: string, opts: RenderCommandOptions): Promise<void> {
    const config = this.configManager.loadWithEnvOverrides();
    const spec = await loadPageSpec(page);
    const text = buildManpage(spec).render(this.renderOptions(config, opts));

    const checkOnly = Boolean(opts.check) || config.output.checkOnly;
    const target = opts.output ?? (config.output.dir ? path.join(config.output.dir, defaultFileName(spec)) : undefined);
    if (target === undefined) {
      if (checkOnly) {
        this.reporter.warn('Nothing to check: pass --output or set output.dir');
        process.exitCode = 1;
        return;
      }
      process.stdout.write(text);
      return;
    }

    const summary: RenderSummary = {
      path: target,
      changed: false,
      checkOnly,
      bytes: Buffer.byteLength(text, 'utf-8'),
      lines: countLines(text),
    };

    if (checkOnly) {
      summary.changed = await isOutdated(target, text);
      console.log(this.formatter.formatRenderResult(summary));
      if (summary.changed) process.exitCode = 1;
      return;
    }

    this.reporter.startTask(`Rendering ${page}`);
    try {
      summary.changed = await writeUpdated(target, text);
    } catch (err) {
      this.reporter.failTask(err);
      throw err;
    }
    this.reporter.completeTask(summary.changed ? `Wrote ${target}` : `${target} already up to date`);
    console.log(this.formatter.formatRenderResult(summary));
  }

  private renderOptions(config: RoffsmithConfig, opts: RenderCommandOptions): RenderOptions {
    return {
      apostrophes: opts.apostrophes === false ? 'ignore' : config.render.apostrophes,
      stripNewlines: Boolean(opts.stripNewlines) || config.render.stripNewlines,
    };
  }
}
