import { TCPClient } from '../server/TCPClient';
import type { TCPClientConfig } from '../server/TCPClient';

export class BenchmarkResult {
  readonly operations: number;
  readonly durationMs: number;
  readonly opsPerSecond: number;
  readonly avgLatencyMs: number;

  constructor(operations: number, durationMs: number) {
    this.operations = operations;
    this.durationMs = durationMs;
    this.opsPerSecond = durationMs > 0 ? (operations * 1000) / durationMs : 0;
    this.avgLatencyMs = operations > 0 ? durationMs / operations : 0;
  }

  static combine(results: readonly BenchmarkResult[]): BenchmarkResult {
    const operations = results.reduce((sum, r) => sum + r.operations, 0);
    const durationMs = results.reduce((max, r) => Math.max(max, r.durationMs), 0);
    return new BenchmarkResult(operations, durationMs);
  }

  format(name: string): string {
    return [
      `Benchmark Results: ${name}`,
      `  Operations: ${this.operations}`,
      `  Duration: ${this.durationMs.toFixed(2)}ms`,
      `  Ops/sec: ${this.opsPerSecond.toFixed(2)}`,
      `  Avg Latency: ${this.avgLatencyMs.toFixed(3)}ms`,
    ].join('\n');
  }
}

/**
 * Issues `SET <prefix>:<i> value_<i>` sequentially over one connection,
 * waiting for each response before sending the next command.
 */
export async function runBenchmark(
  config: TCPClientConfig,
  operations: number,
  keyPrefix: string = 'bench'
): Promise<BenchmarkResult> {
  const client = new TCPClient(config);
  await client.connect();

  try {
    const start = performance.now();
    for (let i = 0; i < operations; i++) {
      await expectOk(client, `SET ${keyPrefix}:${i} value_${i}`);
    }
    return new BenchmarkResult(operations, performance.now() - start);
  } finally {
    await client.disconnect();
  }
}

export async function runConcurrentBenchmark(
  config: TCPClientConfig,
  clients: number,
  operationsPerClient: number
): Promise<BenchmarkResult[]> {
  const runs = Array.from({ length: clients }, (_, index) =>
    runBenchmark(config, operationsPerClient, `bench:${index}`)
  );
  return Promise.all(runs);
}

/**
 * Runs SET commands back to back until durationMs has elapsed.
 */
export async function runStressTest(
  config: TCPClientConfig,
  durationMs: number
): Promise<BenchmarkResult> {
  const client = new TCPClient(config);
  await client.connect();

  try {
    const start = performance.now();
    let operations = 0;
    while (performance.now() - start < durationMs) {
      await expectOk(client, `SET stress:${operations} stress_value_${operations}`);
      operations++;
    }
    return new BenchmarkResult(operations, performance.now() - start);
  } finally {
    await client.disconnect();
  }
}

async function expectOk(client: TCPClient, command: string): Promise<void> {
  const response = await client.send(command);
  if (!response.startsWith('OK')) {
    throw new Error(`Benchmark command failed: ${command} -> ${response}`);
  }
}
