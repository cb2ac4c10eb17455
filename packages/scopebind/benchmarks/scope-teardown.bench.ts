/*
 * Scope Teardown Benchmark
 * ------------------------
 * Measures the cost of the scope lifecycle on its own:
 *   - mount: begin a scope and run a binding with three registrations
 *   - full cycle: mount, resolve everything, tear down
 *   - async cycle: as above, with one putAsync registration
 *   - 1k cycles: steady-state throughput
 *
 * Run:
 *   npm run bench --workspace scopebind
 */

import { Bench } from 'tinybench';
import v8 from 'v8';

import { Injector, token, type Binding } from '../src/index.js';

class Logger {
  log(message: string) {
    return message;
  }
}

class Database {
  closed = false;
  constructor(private readonly logger: Logger) {}

  query() {
    return this.logger.log('query');
  }

  onClose() {
    this.closed = true;
  }
}

class Controller {
  constructor(private readonly db: Database) {}

  handle() {
    return this.db.query();
  }
}

const LoggerT = token<Logger>('Logger');
const DatabaseT = token<Database>('Database');
const ControllerT = token<Controller>('Controller');
const CacheT = token<Map<string, string>>('Cache');

const silent = { debug: () => {}, warn: () => {}, error: () => {} };

const SyncBinding = {
  dependencies(di) {
    di.put(LoggerT, new Logger());
    di.lazyPut(DatabaseT, () => new Database(di.find(LoggerT)));
    di.create(ControllerT, () => new Controller(di.find(DatabaseT)));
  },
} satisfies Binding;

const AsyncBinding: Binding = (di) => {
  SyncBinding.dependencies(di);
  void di.putAsync(CacheT, async () => new Map<string, string>());
};

async function cycle(injector: Injector, binding: Binding): Promise<void> {
  const scope = injector.beginScope('Request');
  injector.runBody(scope, (di) => (typeof binding === 'function' ? binding(di) : binding.dependencies(di)));
  injector.find(ControllerT).handle();
  await injector.endScope(scope);
}

async function main() {
  console.log('=== Scope Teardown Benchmark ===');
  console.log(`Node ${process.version}  ${process.platform} ${process.arch}`);
  console.log(`Heap limit ~${Math.round(v8.getHeapStatistics().heap_size_limit / 1024 / 1024)} MB`);

  const injector = new Injector({ logger: silent, debug: false });
  const bench = new Bench({ time: 1000 });

  bench.add('mount only', () => {
    const scope = injector.beginScope('Mount');
    injector.runBody(scope, (di) => SyncBinding.dependencies(di));
    // Drop registrations so every iteration starts empty
    void injector.endScope(scope);
  });

  bench.add('full cycle (sync)', async () => {
    await cycle(injector, SyncBinding);
  });

  bench.add('full cycle (async)', async () => {
    await cycle(injector, AsyncBinding);
  });

  bench.add('1k cycles', async () => {
    for (let i = 0; i < 1_000; i++) await cycle(injector, SyncBinding);
  });

  console.log(`[phase] running ${bench.tasks.length} tasks`);
  await bench.run();

  console.table(bench.table());
  console.log('\nBenchmark complete');
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
