import type { Controller } from '../types/index.js';
import { logError, logInfo } from '../utils/logger.js';

export interface ControllerStatus {
  name: string;
  running: boolean;
  type: string;
}

export class ControllerRegistry {
  private controllers: Map<string, Controller> = new Map();

  register(controller: Controller): void {
    if (this.controllers.has(controller.name)) {
      throw new Error(`Controller '${controller.name}' is already registered`);
    }
    this.controllers.set(controller.name, controller);
    logInfo(`Registered controller: ${controller.name}`);
  }

  getAll(): Controller[] {
    return Array.from(this.controllers.values());
  }

  async startAll(): Promise<void> {
    logInfo('Starting all controllers...');
    const controllers = this.getAll();

    try {
      await Promise.all(controllers.map((controller) => controller.start()));
      logInfo('All controllers started successfully');
    } catch (error) {
      logError('Failed to start controllers', error);
      await this.stopAll();
      throw error;
    }
  }

  async stopAll(): Promise<void> {
    logInfo('Stopping all controllers...');
    await Promise.all(this.getAll().map((controller) => controller.stop()));
    logInfo('All controllers stopped');
  }

  /** True once at least one controller is registered and all of them run. */
  allRunning(): boolean {
    const controllers = this.getAll();
    return controllers.length > 0 && controllers.every((controller) => controller.getIsRunning());
  }

  getStatus(): Record<string, ControllerStatus> {
    const status: Record<string, ControllerStatus> = {};

    for (const [name, controller] of this.controllers) {
      status[name] = {
        name,
        running: controller.getIsRunning(),
        type: controller.constructor.name,
      };
    }

    return status;
  }

  list(): string[] {
    return Array.from(this.controllers.keys());
  }
}
