export { UserController } from './user_controller.ts';
export { HealthController } from './health_controller.ts';
