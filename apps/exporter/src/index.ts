/**
 * flowgauge exporter
 * Runs the flow collector, enriches its records and serves the counters to Prometheus
 */

import { createChildLogger, getConfig } from '@flowgauge/shared';
import { createFlowPipeline } from '@flowgauge/core';
import { openLookups } from '@flowgauge/geoip';
import { CollectorProcess } from './collector/collector-process.js';
import { currentLocalAddresses } from './local-addresses.js';
import { createMetricsServer } from './server.js';

const logger = createChildLogger({ component: 'Exporter' });

async function main() {
  // Load configuration
  const config = getConfig();

  const lookups = await openLookups(config.geoip);
  const localAddresses = currentLocalAddresses(config.network.localAddresses);

  const { counters, pump } = createFlowPipeline({
    lookups,
    localAddresses,
    countPackets: config.metrics.countPackets,
    verbose: config.verbose,
    // Non-flow collector output goes to stdout unchanged
    diagnosticSink: (line) => {
      process.stdout.write(`${line}\n`);
    },
  });

  const app = await createMetricsServer({ registry: counters.registry, path: config.metrics.path });
  await app.listen({ port: config.metrics.port, host: config.metrics.host });
  logger.info(
    `Prometheus endpoint available at http://${config.metrics.host}:${config.metrics.port}${config.metrics.path}`
  );

  const collector = new CollectorProcess(config.collector);
  collector.start();

  // Shutdown: stop the collector; its stdout closing ends the pump
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    collector.stop();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  try {
    const [stats, exitCode] = await Promise.all([pump.run(collector.lines()), collector.waitForExit()]);
    logger.info({ ...stats, exitCode }, 'Collector finished');
  } finally {
    // Stops the collector when the line stream failed first
    collector.stop();
    await app.close();
  }

  logger.info('finished!');
}

main().then(
  () => process.exit(0),
  (err: unknown) => {
    logger.error({ err }, 'Exporter failed');
    process.exit(1);
  }
);
