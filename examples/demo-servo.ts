#!/usr/bin/env npx tsx
// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Servo Demo
// Clamping, velocity rejection, choreography priority and the emergency stop
// against the simulated driver
// ═══════════════════════════════════════════════════════════════════════════════

import { ServoSystem, SafetyViolation, RunStatus } from '../src';

// Colors
const c = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
};

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

async function main(): Promise<void> {
  console.log(`${c.cyan}${c.bold}
╔═══════════════════════════════════════════════════════════╗
║              SERVO CORE - Motion & Safety Demo            ║
╚═══════════════════════════════════════════════════════════╝
${c.reset}`);

  const system = new ServoSystem({
    config: { logLevel: 'warn', profiles: { directory: './demo-profiles' } },
    hooks: {
      audioCue: (cue, offsetMs) => console.log(`  ${c.magenta}♪${c.reset} ${cue} ${c.dim}@${offsetMs}ms${c.reset}`),
    },
  });
  const { registry, queue, engine, validator, bus } = await system.initialize();

  console.log(`${c.green}✓${c.reset} ${registry.size()} channels loaded, tier ${c.bold}${registry.tier()}${c.reset}`);
  for (const config of registry.all().slice(0, 4)) {
    const { safeMin, safeMax } = config.limits;
    console.log(`  ${c.dim}[${config.channel}]${c.reset} ${config.name.padEnd(16)} safe ${safeMin}-${safeMax}`);
  }

  bus.on<SafetyViolation>('safety:violation', (e) => {
    const color = e.payload.severity === 'critical' ? c.red : c.yellow;
    console.log(`  ${color}⚠ ${e.payload.type}${c.reset} ${e.payload.description}`);
  });
  bus.on<RunStatus>('motion:*', (e) => {
    if (!['motion:run_completed', 'motion:run_stopped', 'motion:run_failed'].includes(e.type)) return;
    console.log(`  ${c.blue}■${c.reset} ${e.payload.name} ${e.payload.state}${e.payload.reason ? ` (${e.payload.reason})` : ''}`);
  });

  // ───────────────────────────────────────────────────────────────────────
  console.log(`\n${c.bold}1. Position clamping${c.reset}`);
  const clamped = queue.submitCommand({ channel: 0, value: 2300, durationMs: 2000 });
  if (clamped.accepted) {
    console.log(`${c.green}✓${c.reset} Accepted ${clamped.id}, target ${clamped.value}`);
  }
  await sleep(2200);
  console.log(`  Dome rotation now at ${engine.getPosition(0)}`);

  // ───────────────────────────────────────────────────────────────────────
  console.log(`\n${c.bold}2. Velocity ceiling${c.reset}`);
  const tooFast = queue.submitCommand({ channel: 1, value: 1750, durationMs: 100 });
  if (!tooFast.accepted) {
    console.log(`${c.red}✗${c.reset} Rejected: ${tooFast.reason} ${c.dim}${tooFast.detail ?? ''}${c.reset}`);
  }

  // ───────────────────────────────────────────────────────────────────────
  console.log(`\n${c.bold}3. Choreography priority${c.reset}`);
  const greet = engine.execute('greet');
  console.log(`${c.green}✓${c.reset} greet started: ${greet.started}`);
  await sleep(300);

  const idle = engine.execute('idle');
  if (!idle.started) console.log(`${c.red}✗${c.reset} idle refused: ${idle.reason}`);

  const alert = engine.execute('alert');
  console.log(`${c.green}✓${c.reset} alert preempts greet: ${alert.started}`);
  await sleep(4500);

  // ───────────────────────────────────────────────────────────────────────
  console.log(`\n${c.bold}4. Emergency stop${c.reset}`);
  engine.execute('playful_dance');
  await sleep(500);
  validator.triggerEmergencyStop('demo operator');

  const blocked = queue.submitCommand({ channel: 3, value: 1500, durationMs: 500 });
  console.log(`${c.red}✗${c.reset} Command while stopped accepted: ${blocked.accepted}`);

  const reset = validator.resetEmergencyStop();
  console.log(`${reset.success ? c.green + '✓' : c.red + '✗'}${c.reset} ${reset.message}`);

  // ───────────────────────────────────────────────────────────────────────
  console.log(`\n${c.bold}5. Shutdown${c.reset}`);
  const status = validator.getStatus();
  console.log(`  ${status.totalViolations} violations recorded, ${status.unresolvedCritical} unresolved critical`);

  await system.shutdown();
  console.log(`${c.green}✓${c.reset} Servos homed and driver released\n`);
}

main().catch((error: unknown) => {
  console.error(`${c.red}Demo failed:${c.reset}`, error);
  process.exit(1);
});
