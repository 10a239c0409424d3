import 'dotenv/config';

import { loadRuntimeConfig } from '../config/runtime_config';
import { SolverClient } from '../host/solver_client';
import { createSolverModule } from '../host/solver_module';
import { createServer } from './app';

async function main(): Promise<void> {
  const config = loadRuntimeConfig();
  const client = new SolverClient(createSolverModule(config));
  const app = createServer(client);
  app.listen(config.port, () => {
    // eslint-disable-next-line no-console
    console.log(
      `Perfect-clear solver running at http://localhost:${config.port} (model=${config.modelPath})`,
    );
  });
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
