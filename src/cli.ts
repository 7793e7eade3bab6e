#!/usr/bin/env -S npx tsx
import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { registerRunCommand, registerValidateCommand } from './commands/index.ts';

const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

const program = new Command();

program
  .name('stepline')
  .description('Declarative YAML workflows for generative-text pipelines')
  .version(version);

registerRunCommand(program);
registerValidateCommand(program);

await program.parseAsync(process.argv);
