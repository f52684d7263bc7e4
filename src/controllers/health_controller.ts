/**
 * Health Controller
 */

import { defineController, type ControllerDefinition } from '../../framework/mod.ts';

export class HealthController {
  readonly routes: ControllerDefinition = defineController<HealthController>({
    routes: [{ method: 'GET', path: '/health', action: 'health' }],
  });

  health(): { status: string } {
    return { status: 'UP' };
  }
}
