// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Server Entry Point
// Starts the full system with the control server; SIGINT/SIGTERM shut it down
// ═══════════════════════════════════════════════════════════════════════════════

import { ServoSystem, ServoSystemOptions } from '../ServoSystem';

export async function startServer(options: ServoSystemOptions = {}): Promise<ServoSystem> {
  const system = new ServoSystem(options);
  await system.initialize();
  await system.startServer();

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;

    system.logger.info(`Received ${signal}, shutting down`);
    system.shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        system.logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  return system;
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    console.error('Failed to start servo system:', error);
    process.exit(1);
  });
}
