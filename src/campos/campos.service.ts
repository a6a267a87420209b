/* eslint-disable prettier/prettier */
import { Injectable, Logger } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import { CompanySession } from '../auth/models/session';
import { isUniqueViolation } from '../common/utils/database-errors.util';
import { logStructured } from '../common/utils/logger.util';
import { CompanyStoreService } from '../company-store/company-store.service';
import { ValorEntity } from '../registros/entities/valor.entity';
import { CreateCampoDto } from './dtos/create-campo.dto';
import { CampoEntity } from './entities/campo.entity';
import { AddCampoOutcome } from './models/add-campo-outcome.model';

@Injectable()
export class CamposService {
  private readonly logger = new Logger(CamposService.name);

  constructor(private readonly companyStore: CompanyStoreService) {}

  listFields(company: CompanySession): Promise<CampoEntity[]> {
    return this.companyStore.withStore(company.storeLocation, (manager) => this.findAll(manager));
  }

  /** Fields in insertion order. */
  findAll(manager: EntityManager): Promise<CampoEntity[]> {
    return manager.getRepository(CampoEntity).find({ order: { id: 'ASC' } });
  }

  async addField(company: CompanySession, createCampoDto: CreateCampoDto): Promise<AddCampoOutcome> {
    const { nombre, tipo } = createCampoDto;

    return this.companyStore.withStore(company.storeLocation, async (manager): Promise<AddCampoOutcome> => {
      const campos = manager.getRepository(CampoEntity);

      if (await campos.existsBy({ nombre })) {
        return { status: 'exists', nombre };
      }

      try {
        const campo = await campos.save(campos.create({ nombre, tipo }));
        logStructured(this.logger, 'log', 'FIELD_ADDED', `Field '${nombre}' added`, {
          accountId: company.accountId,
          campoId: campo.id,
          tipo,
        });
        return { status: 'created', campo };
      } catch (error) {
        if (isUniqueViolation(error)) {
          return { status: 'exists', nombre };
        }
        throw error;
      }
    });
  }

  /**
   * Deletes the field and every value stored for it. Records are kept.
   * Unknown ids change nothing.
   */
  async deleteField(company: CompanySession, id: number): Promise<void> {
    await this.companyStore.withStore(company.storeLocation, (manager) =>
      manager.transaction(async (tx) => {
        const valores = await tx.getRepository(ValorEntity).delete({ campoId: id });
        const campos = await tx.getRepository(CampoEntity).delete({ id });
        logStructured(this.logger, 'log', 'FIELD_DELETED', `Field ${id} deleted`, {
          accountId: company.accountId,
          campoId: id,
          deletedFields: campos.affected ?? 0,
          deletedValues: valores.affected ?? 0,
        });
      }),
    );
  }
}
