import { readFileSync, existsSync, writeFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';
import { OpguardConfig } from './types';

export const CONFIG_FILE_NAMES = ['.opguard.json', 'opguard.config.json'];

export type ConfigTemplate = 'default' | 'strict';

const SeveritySchema = z.enum(['error', 'warning', 'info']);

export const RuleConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    severity: SeveritySchema.optional()
  })
  .strict();

export const ConfigFileSchema = z
  .object({
    rules: z.record(RuleConfigSchema),
    buildingExtension: z.boolean().optional()
  })
  .strict();

const UserConfigSchema = ConfigFileSchema.partial();

type UserConfig = z.infer<typeof UserConfigSchema>;

export class ConfigManager {
  private static instance: ConfigManager;
  private config: OpguardConfig = ConfigManager.defaultConfig();

  private constructor() {}

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /** Rules absent from `rules` fall back to their descriptor defaults. */
  public static defaultConfig(): OpguardConfig {
    return {
      rules: {},
      buildingExtension: false
    };
  }

  public static templateConfig(template: ConfigTemplate): OpguardConfig {
    const severity = template === 'strict' ? 'error' : 'warning';
    return {
      rules: {
        CA5359: { enabled: true, severity },
        CA2216: { enabled: true, severity }
      },
      buildingExtension: false
    };
  }

  public loadConfig(projectPath: string, configPath?: string): OpguardConfig {
    let userConfig: UserConfig = {};

    if (configPath) {
      if (!existsSync(configPath)) {
        throw new ConfigError('configuration file not found', configPath);
      }
      userConfig = this.readConfigFile(configPath, UserConfigSchema);
    } else {
      for (const file of CONFIG_FILE_NAMES) {
        const filePath = join(projectPath, file);
        if (existsSync(filePath)) {
          userConfig = this.readConfigFile(filePath, UserConfigSchema);
          break;
        }
      }
    }

    this.config = this.mergeConfigs(ConfigManager.defaultConfig(), userConfig);
    return this.config;
  }

  public async initializeConfig(projectPath: string, template: ConfigTemplate = 'default'): Promise<string> {
    const config = ConfigManager.templateConfig(template);
    const filePath = join(projectPath, CONFIG_FILE_NAMES[0]);
    writeFileSync(filePath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
    return filePath;
  }

  public async validateConfig(configPath: string): Promise<boolean> {
    try {
      this.readConfigFile(configPath, ConfigFileSchema);
      return true;
    } catch (error: unknown) {
      if (error instanceof ConfigError) {
        console.error(error.message);
        return false;
      }
      throw error;
    }
  }

  public getConfig(): OpguardConfig {
    return this.config;
  }

  private readConfigFile<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    let json: unknown;
    try {
      json = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`cannot parse configuration: ${reason}`, filePath);
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues
        .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`invalid configuration: ${issues}`, filePath);
    }
    return result.data;
  }

  private mergeConfigs(defaultConfig: OpguardConfig, userConfig: UserConfig): OpguardConfig {
    const rules: OpguardConfig['rules'] = { ...defaultConfig.rules };
    for (const [id, rule] of Object.entries(userConfig.rules ?? {})) {
      rules[id] = { ...rules[id], ...rule };
    }

    return {
      rules,
      buildingExtension: userConfig.buildingExtension ?? defaultConfig.buildingExtension
    };
  }
}
