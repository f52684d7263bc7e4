/**
 * Trellis Demo Entry Point
 *
 * Runs the sample calls through the dispatcher, then walks the entity
 * manager through create, cached lookup and lazy loading.
 */

import {
  Dispatcher,
  EntityManager,
  SqliteDriver,
  createLogger,
  isLazyReference,
  isResolved,
  loadConfig,
  setLogger,
  type CallRecord,
  type Logger,
} from './framework/mod.ts';
import { HealthController, Post, SCHEMA, User, UserController } from './src/mod.ts';

const SAMPLE_CALLS: CallRecord[] = [
  { method: 'GET', path: '/health' },
  { method: 'GET', path: '/api/users/123' },
  { method: 'GET', path: '/api/users/42/posts/7' },
  { method: 'POST', path: '/api/users', body: '{"name": "Jane Doe"}' },
  { method: 'GET', path: '/api/users/not-a-number' },
  { method: 'GET', path: '/unknown' },
];

async function runDispatcherDemo(dispatcher: Dispatcher, logger: Logger): Promise<void> {
  for (const call of SAMPLE_CALLS) {
    const response = await dispatcher.dispatch(call);
    logger.info(`${call.method} ${call.path}`, { status: response.status, body: response.body });
  }
}

function runEntityManagerDemo(em: EntityManager, logger: Logger): void {
  // Create
  em.begin();
  const user = User.create('jane_doe', 'jane@example.test');
  em.persist(user);
  em.commit();
  logger.info('Created', { user: user.toString() });

  // Identity map
  em.begin();
  const first = em.find(User, 1);
  const second = em.find(User, 1);
  logger.info('Found twice', { user: String(first), sameInstance: first === second });
  em.commit();

  // Lazy loading
  em.begin();
  const author = em.find(User, 1);
  em.persist(Post.create('My First Post', 'Hello World!', author));
  em.commit();

  em.begin();
  const post = em.find(Post, 1);
  const lazyAuthor = post?.author;
  if (post && lazyAuthor) {
    logger.info('Loaded post', {
      post: post.toString(),
      authorIsReference: isLazyReference(lazyAuthor),
      authorLoaded: isResolved(lazyAuthor),
    });
    logger.info('Author', { username: lazyAuthor.username, authorLoaded: isResolved(lazyAuthor) });
  }
  em.commit();
}

async function main(): Promise<void> {
  // 1. Load configuration
  const config = (await loadConfig()).all();

  // 2. Logging
  const logger = createLogger(config);
  setLogger(logger);

  // 3. Dispatcher
  const dispatcher = Dispatcher.fromConfig(config, logger)
    .register(new UserController())
    .register(new HealthController());
  await runDispatcherDemo(dispatcher, logger);

  // 4. Entity manager
  const driver = new SqliteDriver({ path: config.database.path, logger });
  try {
    driver.exec(SCHEMA);
    runEntityManagerDemo(new EntityManager({ driver, logger }), logger);
  } finally {
    driver.close();
  }
}

main().catch((error: unknown) => {
  console.error('Trellis demo failed:', error);
  process.exit(1);
});
