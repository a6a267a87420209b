/* eslint-disable prettier/prettier */
import { Injectable, Logger } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import { CompanySession } from '../auth/models/session';
import { CamposService } from '../campos/campos.service';
import { CampoEntity } from '../campos/entities/campo.entity';
import { logStructured } from '../common/utils/logger.util';
import { CompanyStoreService } from '../company-store/company-store.service';
import { RegistroNotFoundException } from '../company-store/exceptions/company-store.exceptions';
import { RegistroEntity } from './entities/registro.entity';
import { ValorEntity } from './entities/valor.entity';
import { RegistroWithValues } from './models/registro-view.model';
import { ValuesByFieldId } from './utils/field-values.util';

export interface StoreOverview {
  campos: CampoEntity[];
  registros: RegistroWithValues[];
}

@Injectable()
export class RegistrosService {
  private readonly logger = new Logger(RegistrosService.name);

  constructor(
    private readonly companyStore: CompanyStoreService,
    private readonly camposService: CamposService,
  ) {}

  listRecords(company: CompanySession): Promise<RegistroWithValues[]> {
    return this.companyStore.withStore(company.storeLocation, (manager) => this.findAllWithValues(manager));
  }

  /** Fields and records read through a single connection. */
  overview(company: CompanySession): Promise<StoreOverview> {
    return this.companyStore.withStore(company.storeLocation, async (manager) => ({
      campos: await this.camposService.findAll(manager),
      registros: await this.findAllWithValues(manager),
    }));
  }

  /** Fields plus the current values of one record, keyed by field id. */
  getRecordForEdit(
    company: CompanySession,
    id: number,
  ): Promise<{ campos: CampoEntity[]; valores: Map<number, string> }> {
    return this.companyStore.withStore(company.storeLocation, async (manager) => {
      if (!(await manager.getRepository(RegistroEntity).existsBy({ id }))) {
        throw new RegistroNotFoundException(id);
      }

      const rows = await manager.getRepository(ValorEntity).find({ where: { registroId: id } });
      const valores = new Map<number, string>();
      for (const row of rows) {
        if (row.valor !== null) valores.set(row.campoId, row.valor);
      }

      return { campos: await this.camposService.findAll(manager), valores };
    });
  }

  async addRecord(company: CompanySession, values: ValuesByFieldId): Promise<RegistroEntity> {
    return this.companyStore.withStore(company.storeLocation, (manager) =>
      manager.transaction(async (tx) => {
        const registros = tx.getRepository(RegistroEntity);
        const registro = await registros.save(registros.create());
        const stored = await this.insertValues(tx, registro.id, values);

        logStructured(this.logger, 'log', 'RECORD_ADDED', `Record ${registro.id} added`, {
          accountId: company.accountId,
          registroId: registro.id,
          values: stored,
        });
        return registro;
      }),
    );
  }

  /**
   * Replaces every value of the record with the submission. A field left out
   * of `values`, or submitted empty, ends up without a value.
   */
  async editRecord(company: CompanySession, id: number, values: ValuesByFieldId): Promise<void> {
    await this.companyStore.withStore(company.storeLocation, (manager) =>
      manager.transaction(async (tx) => {
        if (!(await tx.getRepository(RegistroEntity).existsBy({ id }))) {
          throw new RegistroNotFoundException(id);
        }

        await tx.getRepository(ValorEntity).delete({ registroId: id });
        const stored = await this.insertValues(tx, id, values);

        logStructured(this.logger, 'log', 'RECORD_UPDATED', `Record ${id} updated`, {
          accountId: company.accountId,
          registroId: id,
          values: stored,
        });
      }),
    );
  }

  /** Unknown ids change nothing. */
  async deleteRecord(company: CompanySession, id: number): Promise<void> {
    await this.companyStore.withStore(company.storeLocation, (manager) =>
      manager.transaction(async (tx) => {
        await tx.getRepository(ValorEntity).delete({ registroId: id });
        const result = await tx.getRepository(RegistroEntity).delete({ id });

        logStructured(this.logger, 'log', 'RECORD_DELETED', `Record ${id} deleted`, {
          accountId: company.accountId,
          registroId: id,
          deleted: result.affected ?? 0,
        });
      }),
    );
  }

  /** Most recent first. */
  private async findAllWithValues(manager: EntityManager): Promise<RegistroWithValues[]> {
    const registros = await manager.getRepository(RegistroEntity).find({ order: { id: 'DESC' } });
    const valores = await manager.getRepository(ValorEntity).find({ relations: { campo: true } });

    const byRegistro = new Map<number, Record<string, string>>();
    for (const valor of valores) {
      if (!valor.campo || valor.valor === null) continue;
      const map = byRegistro.get(valor.registroId) ?? {};
      map[valor.campo.nombre] = valor.valor;
      byRegistro.set(valor.registroId, map);
    }

    return registros.map((registro) => ({
      id: registro.id,
      creadoAt: registro.creadoAt,
      valores: byRegistro.get(registro.id) ?? {},
    }));
  }

  /** One row per existing field with a non-empty submission. Returns the row count. */
  private async insertValues(tx: EntityManager, registroId: number, values: ValuesByFieldId): Promise<number> {
    const campos = await this.camposService.findAll(tx);
    const rows = campos
      .map((campo) => ({ campoId: campo.id, valor: values.get(campo.id) }))
      .filter((row): row is { campoId: number; valor: string } => row.valor !== undefined && row.valor !== '')
      .map(({ campoId, valor }) => ({ registroId, campoId, valor }));

    if (rows.length > 0) {
      await tx.getRepository(ValorEntity).insert(rows);
    }
    return rows.length;
  }
}
