#!/usr/bin/env node
import process from 'process';
import path from 'path';
import fs from 'fs/promises';

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { AstLoadError, AstNode, loadJsonAst, loadXmlAst } from '../ast';
import { GraphBuilder, ModuleRenderModel, toRenderModel } from '../graph';
import { logger, flushLogs, setLogLevel } from '../utils';

type InputFormat = 'xml' | 'json';

interface BuildCommandOptions {
  inputFormat?: string;
  source?: string;
  module?: string;
  output?: string;
  verbose?: boolean;
}

export function inferInputFormat(filePath: string, explicit?: string): InputFormat {
  if (explicit === 'xml' || explicit === 'json') {
    return explicit;
  }
  if (explicit) {
    throw new Error(`Unsupported input format: ${explicit} (expected xml or json)`);
  }
  return path.extname(filePath).toLowerCase() === '.json' ? 'json' : 'xml';
}

export function parseAst(content: string, format: InputFormat): AstNode {
  if (format === 'xml') {
    return loadXmlAst(content);
  }
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new AstLoadError(
      'JSON AST is not valid JSON',
      'json',
      [error instanceof Error ? error.message : String(error)]
    );
  }
  return loadJsonAst(json);
}

async function cleanExit(code: number): Promise<never> {
  await flushLogs();
  process.exit(code);
}

const program = new Command();

program
  .name('rtl-graph')
  .description('Build architecture, CFG and SSA data-flow graphs from an HDL AST dump')
  .version('0.1.0');

program
  .command('build')
  .description('Build graphs for every module in an AST file and emit the render model as JSON')
  .argument('<ast-file>', 'AST file produced by the HDL frontend (XML or JSON)')
  .option('--input-format <format>', 'Input format: xml or json (default: from file extension)')
  .option('--source <hdl-file>', 'HDL source file, used to attach source text to statement nodes')
  .option('--module <name>', 'Only emit the named module')
  .option('-o, --output <file>', 'Write the render model to a file instead of stdout')
  .option('--verbose', 'Enable verbose logging')
  .action(async (astFile: string, options: BuildCommandOptions) => {
    if (options.verbose) {
      setLogLevel('debug');
    }

    const spinner = ora({ text: 'Loading AST...', stream: process.stderr }).start();

    try {
      const format = inferInputFormat(astFile, options.inputFormat);
      const ast = parseAst(await fs.readFile(astFile, 'utf-8'), format);

      const sourceLines = options.source
        ? (await fs.readFile(options.source, 'utf-8')).split(/\r?\n/)
        : undefined;

      spinner.text = 'Building graphs...';
      const hierarchies = new GraphBuilder({ sourceLines }).buildDesign(ast);
      const selected = options.module
        ? hierarchies.filter(h => h.moduleName === options.module)
        : hierarchies;

      if (options.module && selected.length === 0) {
        spinner.fail(`Module "${options.module}" not found`);
        await cleanExit(1);
      }

      const models: ModuleRenderModel[] = selected.map(toRenderModel);
      const json = JSON.stringify(models, null, 2);

      if (options.output) {
        await fs.writeFile(options.output, json, 'utf-8');
        spinner.succeed(`Wrote ${models.length} module graph(s) to ${options.output}`);
      } else {
        spinner.succeed(`Built ${models.length} module graph(s)`);
        process.stdout.write(`${json}\n`);
      }

      const diagnostics = models.reduce((sum, model) => sum + model.diagnostics.length, 0);
      if (diagnostics > 0) {
        console.error(chalk.yellow(`⚠️  ${diagnostics} diagnostic(s); see the "diagnostics" field of each module`));
      }

      await cleanExit(0);
    } catch (error) {
      spinner.fail('Build failed');
      console.error(chalk.red(error instanceof Error ? error.message : String(error)));
      if (error instanceof AstLoadError) {
        error.details.forEach(detail => console.error(chalk.gray(`  ${detail}`)));
      }
      logger.error('Build failed', { error: error instanceof Error ? error.message : String(error) });
      await cleanExit(1);
    }
  });

program.configureHelp({
  sortSubcommands: true,
});

if (require.main === module) {
  // Handle uncaught errors
  process.on('uncaughtException', error => {
    logger.error('Uncaught exception:', error);
    console.error(chalk.red('\n💥 Uncaught exception:'), error.message);
    process.exit(1);
  });

  process.on('unhandledRejection', reason => {
    logger.error('Unhandled rejection', { reason: String(reason) });
    console.error(chalk.red('\n💥 Unhandled promise rejection:'), reason);
    process.exit(1);
  });

  program.parseAsync().catch(error => {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    process.exit(1);
  });
}
