import { Bench } from 'tinybench';
import { Container, Scope, construct, invoke, key, ref } from '../src/index.js';

/**
 * Resolution Benchmark
 *
 * Measures registration, a cold resolve of a three-level singleton graph, the
 * cached hot path, prototype construction, and an Immediate replace cycle.
 */

class Logger {
  private level = 'info';
  setLevel(level: string) {
    this.level = level;
  }
  log(_msg: string) {
    return this.level;
  }
}

class Database {
  constructor(private readonly logger: Logger) {}
  query() {
    this.logger.log('query');
    return 'data';
  }
}

class UserService {
  constructor(
    private readonly db: Database,
    private readonly logger: Logger
  ) {}
  getUser(id: string) {
    this.logger.log(id);
    return this.db.query();
  }
}

class RequestContext {
  readonly startedAt = Date.now();
}

const LoggerK = key<Logger>('logger');
const DatabaseK = key<Database>('database');
const UserServiceK = key<UserService>('userService');
const RequestK = key<RequestContext>('request');

const bootstrap = () =>
  new Container({
    name: 'Bench',
    bindings: [
      { name: LoggerK, chain: [construct(Logger), invoke('setLevel', 'warn')] },
      { name: DatabaseK, chain: [construct(Database, ref(LoggerK))] },
      { name: UserServiceK, chain: [construct(UserService, ref(DatabaseK), ref(LoggerK))] },
      { name: RequestK, scope: Scope.Prototype, chain: [construct(RequestContext)] },
    ],
  });

async function runResolveBenchmark() {
  console.log('=== Resolution Benchmark ===\n');

  const bench = new Bench({ time: 1000 });

  const warm = bootstrap();
  warm.resolve(UserServiceK);

  bench
    .add('T1: Bootstrap Only (Cold)', () => {
      bootstrap();
    })
    .add('T2: Cold Start (Bootstrap + Resolve)', () => {
      bootstrap().resolve(UserServiceK);
    })
    .add('T3: Warm Resolve (Cached Singleton)', () => {
      warm.resolve(UserServiceK);
    })
    .add('T4: Prototype Resolve', () => {
      warm.resolve(RequestK);
    })
    .add('T5: Immediate Replace + Re-resolve', () => {
      warm.replace(LoggerK, { chain: [construct(Logger)] });
      warm.resolve(LoggerK);
    })
    .add('T6: Async Resolve (Cached Singleton)', async () => {
      await warm.resolveAsync(UserServiceK);
    });

  console.log(`[phase] running ${bench.tasks.length} tasks...`);
  await bench.run();
  console.table(bench.table());

  const getNs = (name: string) => {
    const task = bench.tasks.find((t) => t.name === name);
    return (task?.result?.period ?? 0) * 1_000_000;
  };

  console.log('\nRuntime Lookup Performance:');
  console.log(`  Warm Resolve (T3):      ${getNs('T3: Warm Resolve (Cached Singleton)').toFixed(0)} ns`);
  console.log(`  Prototype Resolve (T4): ${getNs('T4: Prototype Resolve').toFixed(0)} ns`);

  await warm.shutdown();
}

runResolveBenchmark().catch(console.error);
