/* eslint-disable prettier/prettier */
import { Body, Controller, Param, ParseIntPipe, Post, Redirect, Res, UseGuards } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { CurrentCompany } from '../auth/decorators/current-company.decorator';
import { SessionGuard } from '../auth/guards/session.guard';
import { CompanySession } from '../auth/models/session';
import { OnErrorRedirect } from '../common/decorators/on-error-redirect.decorator';
import { FlashResponse, pushFlash } from '../common/flash/flash.util';
import { CamposService } from './campos.service';
import { CreateCampoDto } from './dtos/create-campo.dto';

@ApiTags('Campos')
@UseGuards(SessionGuard)
@OnErrorRedirect('/manage')
@Controller('campos')
export class CamposController {
  constructor(private readonly camposService: CamposService) {}

  @Post('add')
  @Redirect('/manage')
  async addField(
    @Body() createCampoDto: CreateCampoDto,
    @CurrentCompany() company: CompanySession,
    @Res({ passthrough: true }) res: FlashResponse,
  ): Promise<void> {
    const outcome = await this.camposService.addField(company, createCampoDto);

    if (outcome.status === 'created') {
      pushFlash(res, 'success', `Campo '${outcome.campo.nombre}' agregado`);
    } else {
      pushFlash(res, 'warning', 'El campo ya existe');
    }
  }

  @Post('delete/:id')
  @Redirect('/manage')
  async deleteField(
    @Param('id', ParseIntPipe) id: number,
    @CurrentCompany() company: CompanySession,
    @Res({ passthrough: true }) res: FlashResponse,
  ): Promise<void> {
    await this.camposService.deleteField(company, id);
    pushFlash(res, 'info', 'Campo eliminado');
  }
}
