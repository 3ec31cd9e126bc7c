/**
 * Module Type Detector - Runs detector plugins in priority order
 */

import { defaultDetectorPlugins, type ModuleTypeDetectorPlugin } from './detector-plugins';
import { describeError, ModuleDetectionError } from './errors';
import type { FileAccess } from './file-access';
import type { ModuleType } from './types';

export class ModuleTypeDetector {
  private readonly plugins: readonly ModuleTypeDetectorPlugin[];

  /**
   * Plugins are fixed at construction. Higher priority runs first; equal
   * priorities keep the order given (Array.prototype.sort is stable).
   */
  constructor(plugins: ModuleTypeDetectorPlugin[] = defaultDetectorPlugins()) {
    this.plugins = [...plugins].sort((a, b) => b.priority - a.priority);
  }

  getPlugins(): ModuleTypeDetectorPlugin[] {
    return [...this.plugins];
  }

  /**
   * First plugin to report a type wins; later plugins are not consulted.
   */
  detect(fileAccess: FileAccess): ModuleType {
    if (fileAccess === null || fileAccess === undefined) {
      throw new TypeError('fileAccess must not be null');
    }

    for (const plugin of this.plugins) {
      let detected: ModuleType | null;
      try {
        detected = plugin.detect(fileAccess);
      } catch (error) {
        if (error instanceof ModuleDetectionError) {
          throw error;
        }
        throw new ModuleDetectionError(
          `${plugin.name} failed: ${describeError(error)}`,
          fileAccess.getRootPath(),
          { cause: error }
        );
      }

      if (detected !== null) {
        return detected;
      }
    }

    const rootPath = fileAccess.getRootPath();
    throw new ModuleDetectionError(
      `Unknown module type: no detector matched the package at ${rootPath}`,
      rootPath
    );
  }
}
