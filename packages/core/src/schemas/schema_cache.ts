import Ajv from "ajv";
import type { ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";

/**
 * Schema files shipped with the package, under packages/core/schemas.
 */
export const SCHEMA_DIR = path.resolve(__dirname, "..", "..", "schemas");

export type SchemaName =
  | "task_record_schema"
  | "org_directory_schema"
  | "engine_config_schema";

/**
 * Singleton cache for schema validators to avoid repeated I/O and AJV compilation.
 */
export class SchemaValidationCache {
  private static validators = new Map<string, ValidateFunction>();
  private static ajv: Ajv | null = null;

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true, verbose: true });
      addFormats(this.ajv);
    }
    return this.ajv;
  }

  /**
   * Gets or creates a cached validator for a YAML schema file.
   * @param schemaPath Absolute path to the YAML schema file
   */
  static getValidator<T = unknown>(schemaPath: string): ValidateFunction<T> {
    let validator = this.validators.get(schemaPath);
    if (!validator) {
      const schemaContent = fs.readFileSync(schemaPath, "utf8");
      const schema = yaml.load(schemaContent);
      if (typeof schema !== "object" || schema === null) {
        throw new Error(`Schema file ${schemaPath} does not contain an object`);
      }
      validator = this.getAjv().compile(schema);
      this.validators.set(schemaPath, validator);
    }

    return validator as ValidateFunction<T>;
  }

  /**
   * Gets the validator for one of the package's bundled schemas.
   */
  static getBundledValidator<T = unknown>(name: SchemaName): ValidateFunction<T> {
    return this.getValidator<T>(path.join(SCHEMA_DIR, `${name}.yaml`));
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.validators.clear();
    this.ajv = null;
  }

  /**
   * Gets cache statistics for monitoring.
   */
  static getCacheStats(): { cachedSchemas: number; schemasLoaded: string[] } {
    return {
      cachedSchemas: this.validators.size,
      schemasLoaded: Array.from(this.validators.keys())
    };
  }
}
