import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { Config, Engine, Factories, Hierarchy, Logger, Records, Store, Validation } from '@tasking/core';

/**
 * Everything a command needs to evaluate one task read from disk.
 */
export type AssessmentWorkspace = {
  task: Records.TaskRecord;
  engine: Engine.TaskEngine;
};

export type WorkspaceFiles = {
  taskFile: string;
  orgFile: string;
  configFile?: string;
};

/**
 * Dependency Injection Service for the tasking CLI
 *
 * Reads task, org directory and config files (YAML or JSON), loads them into
 * memory stores and wires a TaskEngine over those stores.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private readonly logger = Logger.createLogger('[CLI] ');

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  async loadWorkspace(files: WorkspaceFiles): Promise<AssessmentWorkspace> {
    const task = Factories.createTaskRecordFromDocument(this.readDocument(files.taskFile));
    const directory = Validation.parseOrgDirectory(this.readDocument(files.orgFile));
    const config = files.configFile
      ? Config.loadEngineConfig(path.resolve(files.configFile))
      : Config.resolveEngineConfig();

    const stores = await this.createDirectoryStores(directory);
    const engine = Engine.createTaskEngine({
      hierarchy: new Hierarchy.RecordStoreOrgHierarchy(stores.orgUnits),
      authorities: new Hierarchy.RecordStoreAuthorityLookup(stores.authorities),
      config,
    });

    this.logger.debug(`Loaded ${directory.orgUnits.length} org units for task ${task.id}`);
    return { task, engine };
  }

  /**
   * Parses a YAML or JSON file. JSON is valid YAML, so one loader covers both.
   */
  private readDocument(filePath: string): unknown {
    const content = fs.readFileSync(path.resolve(filePath), 'utf8');
    return yaml.load(content);
  }

  private async createDirectoryStores(
    directory: Validation.OrgDirectory
  ): Promise<Pick<Store.RecordStores, 'orgUnits' | 'authorities'>> {
    const orgUnits = new Store.MemoryRecordStore<Records.OrgUnitRecord>();
    const authorities = new Store.MemoryRecordStore<Records.AuthorityRecord>();

    await orgUnits.putMany(directory.orgUnits.map(value => ({ id: value.id, value })));
    await authorities.putMany((directory.authorities ?? []).map(authority => ({
      id: authority.id,
      value: { ...authority, scope: authority.scope ?? [] },
    })));

    return { orgUnits, authorities };
  }
}
