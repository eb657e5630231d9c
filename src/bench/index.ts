import { CLIParser } from '../cli/CLIParser';
import {
  BenchmarkResult,
  runBenchmark,
  runConcurrentBenchmark,
  runStressTest,
} from './Benchmark';

function printHelp(): void {
  console.log(`
emberkv benchmark

Usage: node dist/bench/index.js [options]

Options:
  --host=HOST       Server host (default: 127.0.0.1)
  --port=PORT       Server TCP port (default: 2312)
  --ops=N           SET commands per client (default: 1000)
  --clients=N       Concurrent connections (default: 1)
  --duration=SECS   Run a stress test for SECS seconds instead
`);
}

async function main(): Promise<void> {
  const options = new CLIParser().parseBenchmark();

  if (options.help) {
    printHelp();
    return;
  }

  const target = { host: options.host, port: options.port };

  if (options.durationMs !== undefined) {
    const result = await runStressTest(target, options.durationMs);
    console.log(result.format(`stress test (${options.durationMs / 1000}s)`));
    return;
  }

  if (options.clients > 1) {
    const results = await runConcurrentBenchmark(target, options.clients, options.operations);
    results.forEach((result, index) => console.log(result.format(`client ${index + 1}`)));
    console.log(BenchmarkResult.combine(results).format(`${options.clients} clients combined`));
    return;
  }

  const result = await runBenchmark(target, options.operations);
  console.log(result.format(`sequential SET x${options.operations}`));
}

main().catch((err) => {
  console.error('Benchmark failed:', err);
  process.exit(1);
});
