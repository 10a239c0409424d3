#!/usr/bin/env node
import 'dotenv/config';

import { loadRuntimeConfig } from '../config/runtime_config';
import { SolverClient } from '../host/solver_client';
import { createSolverModule } from '../host/solver_module';
import { parseOptions } from './options';
import { renderField } from './render';

function main(): void {
  const options = parseOptions(process.argv.slice(2));
  const client = new SolverClient(createSolverModule(loadRuntimeConfig()));

  if (options.render) {
    // eslint-disable-next-line no-console
    console.log(renderField(options.field, options.height));
  }

  if (options.check) {
    // eslint-disable-next-line no-console
    console.log(String(client.checkPCPossible(options.field, options.pieces, options.height)));
    return;
  }

  // eslint-disable-next-line no-console
  console.log(client.findPath(options.field, options.pieces, options.height));
}

try {
  main();
} catch (error) {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
}
