#!/usr/bin/env tsx

import type { Command } from 'commander';
import { createProgram } from './program.js';

const program = createProgram();

// Default action (no command): show the ranked view
program.action((_opts: unknown, cmd: Command) => {
  cmd.commands.find(c => c.name() === 'rank')?.parse([], { from: 'user' });
});

program.parse();
