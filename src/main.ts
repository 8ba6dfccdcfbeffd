// ================================================================================================
// INDEX POOLS: Entry Point
//
// Builds the in-process environment, seeds it from the universe file and serves the
// HTTP API. The clock starts at wall time and ticks once per second after seeding;
// the seeded prices are re-recorded every observation period to keep averages in range.
//
// Usage:
//   API_SERVER_PORT=4040 UNIVERSE_FILE=data/universe.json npm start
// ================================================================================================

import { resolveConfig, loadUniverse } from './config';
import { createEnvironment, recordUniversePrices, seedUniverse } from './core/environment';
import { ManualClock } from './core/ledger/clock';
import { startApiServer } from './api-server';
import { createLogger, setLogLevel } from './utils';

const log = createLogger('[Main]');

const TICK_MS = 1000;

function main(): void {
  // ── 1. Load config ──
  const config = resolveConfig();
  setLogLevel(config.logLevel);

  log.info('═══════════════════════════════════════════════');
  log.info('   Index Pools: Starting');
  log.info('═══════════════════════════════════════════════');

  // ── 2. Create core components ──
  const clock = new ManualClock(Math.floor(Date.now() / 1000));
  const env = createEnvironment({ clock, oracle: config.oracle, controller: config.controller });

  // ── 3. Seed tokens, categories and pools ──
  const universe = loadUniverse(config.universeFile);
  const seeded = seedUniverse(env, clock, universe);

  // ── 4. Start API ──
  const { server } = startApiServer(config.apiServerPort, { env });

  // ── 5. Wire up EventBus → log ──
  env.eventBus.onLogType('pool-reweighed', (entry) => log.info(`⚖️ ${entry.pool} reweighed`));
  env.eventBus.onLogType('pool-reindexed', (entry) => log.info(`🔁 ${entry.pool} reindexed`));

  // ── 6. Clock ticker; prices are re-recorded once per observation period ──
  let lastPriceUpdate = clock.now();
  const ticker = setInterval(() => {
    const now = clock.advance(TICK_MS / 1000);
    if (now - lastPriceUpdate >= config.oracle.observationPeriod) {
      recordUniversePrices(env, universe);
      lastPriceUpdate = now;
    }
  }, TICK_MS);

  // ── 7. Signal handling ──
  const shutdown = (): void => {
    log.info('Shutting down...');
    clearInterval(ticker);
    server.close((err) => {
      if (err) log.error('API server close failed:', err);
      env.destroy();
      log.info('Goodbye.');
      process.exit(err ? 1 : 0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  log.info('═══════════════════════════════════════════════');
  log.info('   Index Pools: Running');
  log.info(`   API: http://localhost:${config.apiServerPort}`);
  log.info(`   Tokens: ${seeded.tokens.size}`);
  log.info(`   Pools: ${seeded.pools.join(', ')}`);
  log.info('═══════════════════════════════════════════════');
}

try {
  main();
} catch (err) {
  log.error('Fatal error:', err);
  process.exit(1);
}
