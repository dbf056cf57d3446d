import { promises as fs } from 'fs';
import { ClockConfig } from '../models/clock-config.types';
import { ConfigError, ResourceError } from '../models/errors';
import { Clock } from './clock.service';
import { clockConfigSchema, StyleService } from './style.service';

/**
 * Reads declarative clock configurations from JSON values and files
 */
export class ConfigLoaderService {
  private readonly styleService = new StyleService();

  /**
   * Check the overall configuration shape; element properties are checked
   * later, when each element is built
   */
  parseConfig(value: unknown): ClockConfig {
    return this.styleService.validate(clockConfigSchema, value, 'configuration');
  }

  async loadConfigFile(filePath: string): Promise<ClockConfig> {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf8');
    } catch {
      throw new ResourceError('Configuration file could not be read', filePath);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new ConfigError(
        `Invalid JSON in configuration file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    return this.parseConfig(json);
  }

  async loadClock(filePath: string): Promise<Clock> {
    return Clock.fromConfig(await this.loadConfigFile(filePath));
  }
}
