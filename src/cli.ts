#!/usr/bin/env node

import readline from 'readline';
import { CompileResult } from './models/run.model';
import { createCompilerFromConfig } from './services/compiler/factory';
import { CompilationCancelledError, errorMessage } from './services/errors';

// --- Exit codes ---
const EXIT_WORKFLOW = 0;
const EXIT_ERROR = 1;
const EXIT_CLARIFICATION = 2;

export function exitCodeFor(result: CompileResult): number {
  switch (result.outcome) {
    case 'workflow':
      return EXIT_WORKFLOW;
    case 'clarification':
      return EXIT_CLARIFICATION;
    case 'error':
      return EXIT_ERROR;
  }
}

function printResult(result: CompileResult): void {
  console.log(JSON.stringify(result, null, 2));
}

async function runOnce(request: string): Promise<number> {
  const { compiler, context } = createCompilerFromConfig();
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const result = await compiler.compile(request, context, { signal: controller.signal });
  printResult(result);
  return exitCodeFor(result);
}

function runInteractive(): void {
  const { compiler, context, parserKind } = createCompilerFromConfig();

  console.log('------------------------------------------');
  console.log(`Workflow compiler (${parserKind} parser)`);
  console.log('Type a request and press Enter.');
  console.log('Type "/exit" to quit.');
  console.log('------------------------------------------');

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'YOU> ',
  });

  rl.on('line', (line) => {
    const request = line.trim();
    if (request === '/exit') {
      rl.close();
      return;
    }
    if (request === '') {
      rl.prompt();
      return;
    }

    rl.pause();
    compiler
      .compile(request, context)
      .then(printResult)
      .catch((error: unknown) => console.error(`[Error] ${errorMessage(error)}`))
      .finally(() => {
        rl.resume();
        rl.prompt();
      });
  });

  rl.on('close', () => {
    console.log('Bye.');
    process.exit(0);
  });

  rl.prompt();
}

if (require.main === module) {
  const request = process.argv.slice(2).join(' ').trim();
  if (request) {
    runOnce(request)
      .then((code) => {
        process.exitCode = code;
      })
      .catch((error: unknown) => {
        console.error(`FATAL: ${errorMessage(error)}`);
        process.exitCode = error instanceof CompilationCancelledError ? 130 : EXIT_ERROR;
      });
  } else {
    try {
      runInteractive();
    } catch (error) {
      console.error(`FATAL: ${errorMessage(error)}`);
      process.exit(EXIT_ERROR);
    }
  }
}
