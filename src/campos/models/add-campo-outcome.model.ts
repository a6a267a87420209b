import { CampoEntity } from '../entities/campo.entity';

export type AddCampoOutcome =
  | { status: 'created'; campo: CampoEntity }
  | { status: 'exists'; nombre: string };
