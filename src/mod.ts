/**
 * Application Source
 *
 * Sample controllers and entities used by the demo.
 */

export { UserController, HealthController } from './controllers/mod.ts';
export { User, Post } from './models/mod.ts';
export { SCHEMA } from './schema.ts';
