// transformEngine.ts
// Facade over the pipeline: a dataset resolver plus named, validated
// configs.
//
//   const engine = TransformEngine.fromResolver(inMemoryResolver(db))
//     .useConfigFile(text)
//     .registerConfig("open_orders", config);
//
//   engine.run("open_orders", { offset: 0, limit: 50 });

import { TransformConfig, parseTransformConfig } from "./config";
import { ConfigCheckResult, checkConfig } from "./configCheck";
import { DatasetResolver } from "./datasets";
import { ValidationError } from "./errors";
import { PageRequest, TransformOptions, TransformResponse, runTransform } from "./pipeline";
import { TransformSchema, exportSchema } from "./schemaExport";

export class TransformEngine {
  private resolve: DatasetResolver;
  private configs: Record<string, TransformConfig> = {};
  private options: TransformOptions;

  private constructor(resolve: DatasetResolver, options: TransformOptions) {
    this.resolve = resolve;
    this.options = options;
  }

  static fromResolver(resolve: DatasetResolver, options: TransformOptions = {}): TransformEngine {
    return new TransformEngine(resolve, options);
  }

  /**
   * Load named configs from JSON text shaped `{ "<name>": <config>, ... }`.
   * Every entry is validated before any is registered.
   */
  useConfigFile(text: string): this {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ValidationError("configFile", `invalid JSON: ${reason}`);
    }
    if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new ValidationError("configFile", "expected an object of named configs");
    }

    const loaded: Record<string, TransformConfig> = {};
    for (const [name, raw] of Object.entries(parsed)) {
      try {
        loaded[name] = parseTransformConfig(raw);
      } catch (err) {
        if (err instanceof ValidationError) {
          throw new ValidationError(`${name}.${err.field}`, err.reason);
        }
        throw err;
      }
    }
    this.configs = { ...this.configs, ...loaded };
    return this;
  }

  registerConfig(name: string, config: TransformConfig): this {
    this.configs[name] = config;
    return this;
  }

  getConfig(name: string): TransformConfig {
    if (!Object.prototype.hasOwnProperty.call(this.configs, name)) {
      throw new Error(`Unknown config: ${name}`);
    }
    return this.configs[name];
  }

  configNames(): string[] {
    return Object.keys(this.configs).sort();
  }

  /** Never throws; an unknown config name is an error response too. */
  run(nameOrConfig: string | TransformConfig, page: PageRequest = {}): TransformResponse {
    let config: TransformConfig;
    try {
      config = this.toConfig(nameOrConfig);
    } catch (err) {
      return { status: "error", message: err instanceof Error ? err.message : String(err) };
    }
    return runTransform(config, this.resolve, page, this.options);
  }

  describe(nameOrConfig: string | TransformConfig): TransformSchema {
    return exportSchema(this.toConfig(nameOrConfig), this.resolve, this.options.inspect);
  }

  /** Every problem of a config at once, without running it. */
  check(nameOrConfig: string | TransformConfig): ConfigCheckResult {
    return checkConfig(this.toConfig(nameOrConfig), this.resolve, this.options.inspect);
  }

  private toConfig(nameOrConfig: string | TransformConfig): TransformConfig {
    return typeof nameOrConfig === "string" ? this.getConfig(nameOrConfig) : nameOrConfig;
  }
}
