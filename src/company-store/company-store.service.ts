/* eslint-disable prettier/prettier */
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { access, rm } from 'fs/promises';
import { join } from 'path';
import { DataSource, EntityManager } from 'typeorm';
import { CampoEntity } from '../campos/entities/campo.entity';
import { logStructured } from '../common/utils/logger.util';
import { DefaultField } from '../config/default-fields';
import { COMPANY_STORE_ENTITIES } from './company-store-entities';
import { StoreUnavailableException } from './exceptions/company-store.exceptions';

/**
 * Opens the per-company SQLite stores. Every call gets its own DataSource that
 * is destroyed when the work finishes; nothing is pooled between requests.
 */
@Injectable()
export class CompanyStoreService {
  private readonly logger = new Logger(CompanyStoreService.name);

  constructor(private readonly configService: ConfigService) {}

  /** Store location for an account id, known before the account row exists. */
  locationFor(accountId: string): string {
    return join(this.configService.getOrThrow<string>('dataDir'), `company_${accountId}.db`);
  }

  defaultFields(): DefaultField[] {
    return this.configService.get<DefaultField[]>('defaultFields') ?? [];
  }

  /**
   * Creates the store file with its schema and seeds the default fields.
   * A partially created file is removed before the error propagates.
   */
  async provision(location: string, defaults: DefaultField[] = this.defaultFields()): Promise<void> {
    const dataSource = this.createDataSource(location, true);
    try {
      await dataSource.initialize();
      if (defaults.length > 0) {
        await dataSource
          .createQueryBuilder()
          .insert()
          .into(CampoEntity)
          .values(defaults.map(({ nombre, tipo }) => ({ nombre, tipo })))
          .orIgnore()
          .updateEntity(false)
          .execute();
      }
      logStructured(this.logger, 'log', 'STORE_PROVISIONED', 'Company store created', {
        location,
        defaultFields: defaults.map((field) => field.nombre),
      });
    } catch (error) {
      await this.destroy(dataSource);
      await rm(location, { force: true });
      throw error;
    }
    await this.destroy(dataSource);
  }

  /** Removes a store file. A missing file is not an error. */
  async discard(location: string): Promise<void> {
    await rm(location, { force: true });
    logStructured(this.logger, 'warn', 'STORE_DISCARDED', 'Company store removed', { location });
  }

  /**
   * Runs `work` against the store at `location`. A missing file is never
   * created here: it fails with StoreUnavailableException.
   */
  async withStore<T>(location: string, work: (manager: EntityManager) => Promise<T>): Promise<T> {
    if (!location || !(await this.exists(location))) {
      logStructured(this.logger, 'warn', 'STORE_UNAVAILABLE', 'Company store file not found', { location });
      throw new StoreUnavailableException();
    }

    const dataSource = this.createDataSource(location, false);
    try {
      await dataSource.initialize();
    } catch (error) {
      this.logger.error(
        `Could not open company store ${location}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw new StoreUnavailableException();
    }

    try {
      return await work(dataSource.manager);
    } finally {
      await this.destroy(dataSource);
    }
  }

  private createDataSource(location: string, synchronize: boolean): DataSource {
    return new DataSource({
      type: 'better-sqlite3',
      database: location,
      entities: COMPANY_STORE_ENTITIES,
      synchronize,
      logging: false,
    });
  }

  private async exists(location: string): Promise<boolean> {
    try {
      await access(location);
      return true;
    } catch {
      return false;
    }
  }

  private async destroy(dataSource: DataSource): Promise<void> {
    if (dataSource.isInitialized) {
      await dataSource.destroy();
    }
  }
}
