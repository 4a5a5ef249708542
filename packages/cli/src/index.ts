#!/usr/bin/env node
import { Command } from 'commander';
import { registerInit } from './commands/init.js';
import { registerCollect } from './commands/collect.js';
import { registerParse } from './commands/parse.js';
import { registerUntranslated } from './commands/untranslated.js';
import { registerApply } from './commands/apply.js';
import { registerExport } from './commands/export.js';
import { registerImport } from './commands/import.js';

export const program = new Command();

program
  .name('linguamerge')
  .description('Collect, export and merge translations for Qt Linguist catalogs')
  .version('0.1.0');

registerInit(program);
registerCollect(program);
registerParse(program);
registerUntranslated(program);
registerApply(program);
registerExport(program);
registerImport(program);

program.parse();
