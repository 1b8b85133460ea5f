import { createApp } from './app';
import { createApiState, ApiState } from './state';
import { loadConfig } from './config';
import { restoreApiState } from './restore';
import { FundingScheduler } from './scheduler';
import { createInMemoryStores } from '../persistence/inMemoryStores';
import { createSqliteStores, SqliteStores } from '../persistence/sqlite';

async function main() {
  const config = loadConfig();
  const options = {
    owner: config.owner,
    stakingTokenSymbol: config.stakingTokenSymbol,
    rewardsTokenSymbol: config.rewardsTokenSymbol,
  };

  let state: ApiState;
  let sqliteStores: SqliteStores | undefined;

  if (config.storeBackend === 'sqlite') {
    sqliteStores = createSqliteStores(config.dbPath);
    state = await restoreApiState(sqliteStores, options);
    console.log(
      `State restored: phase ${state.engine.programPhase(state.clock())}, ` +
      `${state.engine.getState().balances.size} stakers, totalSupply ${state.engine.totalSupply}`
    );
  } else {
    state = createApiState(createInMemoryStores(), options);
    console.log('Using in-memory stores (data will not persist)');
  }

  const app = createApp(state);

  let scheduler: FundingScheduler | undefined;
  if (config.scheduler) {
    scheduler = new FundingScheduler(state, config.scheduler);
    scheduler.start();
  }

  const server = app.listen(config.port, () => {
    console.log(`Staking rewards API server running on port ${config.port}`);
    console.log(`Store backend: ${config.storeBackend}`);
    console.log(`Owner: ${state.engine.owner}, engine address: ${state.engine.address}`);
    console.log(`Admin key: ${config.adminKeySet ? '[SET]' : 'test-admin-key (default)'}`);
    if (scheduler) console.log('Funding scheduler: enabled');
    console.log(`Health check: http://localhost:${config.port}/health`);
  });

  // Graceful shutdown
  const shutdown = () => {
    console.log('Shutting down...');
    scheduler?.stop();
    state.journal.close();
    server.close(() => {
      sqliteStores?.db.close();
      console.log('Server stopped.');
      process.exit(0);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch(err => {
  console.error('Startup failed:', err);
  process.exit(1);
});
