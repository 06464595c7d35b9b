import 'dotenv/config';
import { v7 as uuid } from 'uuid';
import { createRedis } from './db';
import { createResultBackend } from './broker';
import { RedisTaskQueue } from './broker/redis-task-queue';
import { ResultBackend } from './broker/types';
import { loadConfig } from './config';
import { TaskWorker } from './worker';

const TAG = '[taskfleet]';

// Central configuration, read once
const config = loadConfig();
const workerId = `worker-${uuid().slice(0, 8)}`;

// Wiring
const redis = createRedis(config.brokerUrl);
const queue = new RedisTaskQueue(redis, config.resultTtlSeconds);

let results: ResultBackend | null = null;
let worker: TaskWorker | null = null;

async function main() {
  console.log(`${TAG} starting worker ${workerId}...`);

  // Health checks
  await redis.ping();
  console.log(`${TAG} broker connected`);

  results = await createResultBackend(config.resultBackendUrl, config.resultTtlSeconds);
  console.log(`${TAG} result backend ready`);

  worker = new TaskWorker(queue, results, {
    workerId,
    queues: config.workerQueues,
    concurrency: config.workerConcurrency,
  });
  worker.start();

  console.log(`${TAG} worker ready`);
}

async function shutdown(signal: string) {
  console.log(`${TAG} ${signal} received, shutting down...`);

  if (worker) await worker.stop();
  if (results) await results.close();
  await redis.quit();

  console.log(`${TAG} shutdown complete`);
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((err) => {
    console.error(`${TAG} shutdown failed:`, err);
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
