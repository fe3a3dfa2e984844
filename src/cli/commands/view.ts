import type { Command } from 'commander';
import { z } from 'zod';
import { numeric, parseOptions, runOnSession } from '../options.js';
import { SORT_OPTIONS } from '../../domain/value-objects/SortOption.js';

/** 註冊導覽與資料載入指令：goto、region、genome、load、sort */
export function registerViewCommands(program: Command): void {
  program
    .command('goto')
    .alias('go')
    .description('Navigate to one or more loci, e.g. "chr1:1000-2000" or a gene name')
    .argument('<loci...>', 'Loci to show')
    .action(async (loci: string[], _opts: unknown, cmd: Command) => {
      await runOnSession(cmd, 'goto', (igv) => igv.goto(...loci));
    });

  program
    .command('region')
    .description('Define a region of interest')
    .argument('<chr>', 'Chromosome')
    .argument('<start>', 'Start position')
    .argument('<end>', 'End position')
    .argument('[description]', 'Region description')
    .action(async (chr: string, start: string, end: string, description: string | undefined, _opts: unknown, cmd: Command) => {
      const range = parseOptions(
        z.object({ start: numeric('start'), end: numeric('end') }),
        { start, end },
      );
      await runOnSession(cmd, 'region', (igv) => igv.region(chr, range.start, range.end, description));
    });

  program
    .command('genome')
    .description('Load a genome by id (e.g. hg19) or from a local file')
    .argument('<genome>', 'Genome id or path')
    .action(async (genome: string, _opts: unknown, cmd: Command) => {
      await runOnSession(cmd, 'genome', (igv) => igv.genome(genome));
    });

  program
    .command('load')
    .description('Load a data file from a local path or URL')
    .argument('<pathOrUrl>', 'File path or URL')
    .option('--index <pathOrUrl>', 'Index file for the data file')
    .action(async (pathOrUrl: string, _opts: unknown, cmd: Command) => {
      const { index } = parseOptions(z.object({ index: z.string().optional() }), cmd.opts());
      await runOnSession(cmd, 'load', (igv) => igv.load(pathOrUrl, { index }));
    });

  program
    .command('sort')
    .description(`Sort alignments: ${SORT_OPTIONS.join(', ')}`)
    .argument('[option]', 'Sort option', 'base')
    .argument('[locus]', 'Locus to sort at')
    .action(async (option: string, locus: string | undefined, _opts: unknown, cmd: Command) => {
      await runOnSession(cmd, 'sort', (igv) => igv.sort(option, locus));
    });
}
