import { join, resolve } from 'path';
import { DEFAULT_FIELDS_SETTING, DefaultField, parseDefaultFields } from './default-fields';

export interface AppConfig {
  port: number;
  dataDir: string;
  sessionSecret?: string;
  sessionExpiresIn?: number;
  defaultFields: DefaultField[];
}

export default (): AppConfig => {
  const expiresIn = process.env.SESSION_EXPIRES_IN
    ? parseInt(process.env.SESSION_EXPIRES_IN, 10)
    : undefined;

  return {
    port: parseInt(process.env.PORT ?? '5000', 10) || 5000,
    dataDir: resolve(process.env.DATA_DIR ?? join(process.cwd(), 'data')),
    sessionSecret: process.env.SESSION_SECRET,
    sessionExpiresIn: expiresIn && expiresIn > 0 ? expiresIn : undefined,
    defaultFields: parseDefaultFields(process.env.DEFAULT_FIELDS ?? DEFAULT_FIELDS_SETTING),
  };
};
