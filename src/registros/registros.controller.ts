/* eslint-disable prettier/prettier */
import {
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Redirect,
  Render,
  Res,
  UseGuards,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { CurrentCompany } from '../auth/decorators/current-company.decorator';
import { SessionGuard } from '../auth/guards/session.guard';
import { CompanySession } from '../auth/models/session';
import { CamposService } from '../campos/campos.service';
import { FieldType } from '../campos/models/field-type.enum';
import { OnErrorRedirect } from '../common/decorators/on-error-redirect.decorator';
import { Flashes } from '../common/flash/flashes.decorator';
import { FlashMessage, FlashResponse, pushFlash } from '../common/flash/flash.util';
import { toFormFields, toRegistroRows } from './models/registro-view.model';
import { RegistrosService } from './registros.service';
import { extractFieldValues } from './utils/field-values.util';

@ApiTags('Registros')
@UseGuards(SessionGuard)
@OnErrorRedirect('/')
@Controller()
export class RegistrosController {
  constructor(
    private readonly registrosService: RegistrosService,
    private readonly camposService: CamposService,
  ) {}

  @Get()
  @Render('index')
  @OnErrorRedirect('/login')
  async index(@CurrentCompany() company: CompanySession, @Flashes() flashes: FlashMessage[]) {
    const { campos, registros } = await this.registrosService.overview(company);
    return {
      title: 'Registros',
      company,
      flashes,
      campos,
      registros: toRegistroRows(campos, registros),
    };
  }

  @Get('agregar')
  @Render('agregar')
  async addForm(@CurrentCompany() company: CompanySession, @Flashes() flashes: FlashMessage[]) {
    const campos = await this.camposService.listFields(company);
    return { title: 'Agregar registro', company, flashes, campos: toFormFields(campos) };
  }

  @Post('agregar')
  @Redirect('/')
  async addRecord(
    @Body() body: Record<string, unknown>,
    @CurrentCompany() company: CompanySession,
    @Res({ passthrough: true }) res: FlashResponse,
  ): Promise<void> {
    await this.registrosService.addRecord(company, extractFieldValues(body));
    pushFlash(res, 'success', 'Registro agregado');
  }

  @Get('editar/:id')
  @Render('editar')
  async editForm(
    @Param('id', ParseIntPipe) id: number,
    @CurrentCompany() company: CompanySession,
    @Flashes() flashes: FlashMessage[],
  ) {
    const { campos, valores } = await this.registrosService.getRecordForEdit(company, id);
    return { title: `Editar registro ${id}`, company, flashes, registroId: id, campos: toFormFields(campos, valores) };
  }

  @Post('editar/:id')
  @Redirect('/')
  async editRecord(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: Record<string, unknown>,
    @CurrentCompany() company: CompanySession,
    @Res({ passthrough: true }) res: FlashResponse,
  ): Promise<void> {
    await this.registrosService.editRecord(company, id, extractFieldValues(body));
    pushFlash(res, 'success', 'Registro actualizado');
  }

  @Get('manage')
  @Render('manage')
  @OnErrorRedirect('/login')
  async manage(@CurrentCompany() company: CompanySession, @Flashes() flashes: FlashMessage[]) {
    const { campos, registros } = await this.registrosService.overview(company);
    return {
      title: 'Administrar',
      company,
      flashes,
      campos,
      fieldTypes: Object.values(FieldType),
      registros: toRegistroRows(campos, registros),
    };
  }

  @Post('registros/delete/:id')
  @Redirect('/manage')
  @OnErrorRedirect('/manage')
  async deleteRecord(
    @Param('id', ParseIntPipe) id: number,
    @CurrentCompany() company: CompanySession,
    @Res({ passthrough: true }) res: FlashResponse,
  ): Promise<void> {
    await this.registrosService.deleteRecord(company, id);
    pushFlash(res, 'info', 'Registro eliminado');
  }
}
