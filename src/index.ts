/**
 * Limbic Core — Server Entry Point
 *
 * Hosts one state engine behind its core handle and drives it from
 * two sides:
 * - the life loop, ticking once per period on its own
 * - the HTTP stimulus route, ticking on demand with attention
 *
 * Every snapshot, from either side, is appended to the SQLite log.
 */

import dotenv from 'dotenv';
dotenv.config();

import express from 'express';
import { loadServiceConfig } from './core/config';
import { StateEngine } from './consciousness/engine';
import { CoreHandle } from './consciousness/core-handle';
import { LifeLoop } from './consciousness/loop';
import { InputChannel } from './consciousness/input';
import { createRandomSource } from './consciousness/random';
import { KeywordSignalMapper } from './signals/mapper';
import { SnapshotLog } from './memory/snapshot-log';
import { createCoreRouter } from './api/routes';

const config = loadServiceConfig();

// ─── Initialize Core ────────────────────────────────────────────────

const engine = new StateEngine(config.engine, { random: createRandomSource(config.seed) });
const handle = new CoreHandle(engine);
const log = new SnapshotLog(config.dbPath);

handle.subscribe((snapshot, origin) => {
  log.record(snapshot, origin);
});

const loop = new LifeLoop(handle, { tickIntervalMs: config.tickIntervalMs });
const input = new InputChannel(handle, new KeywordSignalMapper());

const stats = log.getStats();

console.log('');
console.log('  ====================================================');
console.log('  LIMBIC CORE v0.1.0');
console.log('  Rhythm, echo and awareness for a language model');
console.log('  ====================================================');
console.log('');
console.log('  Engine:');
console.log(`    base frequency   ${config.engine.baseFrequency}`);
console.log(`    noise            ${config.engine.noiseAmplitude}`);
console.log(`    variability      ${config.engine.internalVariability}`);
console.log(`    spontaneous p    ${config.engine.spontaneousEventProbability}`);
console.log(`    echo lifetime    ${config.engine.echoLifetime}s`);
console.log(`    threshold        ${config.engine.awarenessThreshold}`);
console.log(`    seed             ${config.seed ?? 'none (entropy)'}`);
console.log('');
console.log(`  Persistence: ${config.dbPath}`);
console.log(`    ${stats.totalSnapshots} snapshots in ${stats.sessions} sessions`);
console.log(`    session ${log.sessionId}`);
console.log('');

// ─── HTTP ───────────────────────────────────────────────────────────

const app = express();
app.use(express.json());
app.use(createCoreRouter({ handle, input, loop, log }));

// ─── Graceful Shutdown ──────────────────────────────────────────────

async function shutdown(): Promise<void> {
  console.log('\n  Shutting down gracefully...');
  await loop.stop();
  log.close();
  process.exit(0);
}

function onSignal(): void {
  shutdown().catch(err => {
    console.error('  Shutdown failed:', err);
    process.exit(1);
  });
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

// ─── Start Server + Life Loop ───────────────────────────────────────

app.listen(config.port, () => {
  console.log(`  Listening on http://localhost:${config.port}`);
  console.log('');
  console.log('  Endpoints:');
  console.log('    GET  /v1/health            — Health + persistence stats');
  console.log('    GET  /v1/core              — Latest snapshot + loop status');
  console.log('    POST /v1/core/stimulus     — Feed { signal } or { text }');
  console.log('    GET  /v1/core/snapshots    — Recent snapshots');
  console.log('    GET  /v1/core/awareness    — Recent acts of awareness');
  console.log('    GET  /v1/core/export       — Training records for a session');
  console.log('');

  loop.start();

  console.log('  Ready.');
  console.log('');
});

export { engine, handle, loop, input, log };
