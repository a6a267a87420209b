import { ConfigService } from '@nestjs/config';
import { JwtModule, JwtService } from '@nestjs/jwt';
import { Test, TestingModule } from '@nestjs/testing';
import { TypeOrmModule, getRepositoryToken } from '@nestjs/typeorm';
import { plainToInstance } from 'class-transformer';
import { readdir } from 'fs/promises';
import { QueryFailedError, Repository } from 'typeorm';
import { FieldType } from '../campos/models/field-type.enum';
import { CompanyStoreService } from '../company-store/company-store.service';
import { createTempDataDir, removeTempDataDir } from '../testing/temp-data-dir';
import { AuthService } from './auth.service';
import { LoginDto } from './dtos/login.dto';
import { RegisterDto } from './dtos/register.dto';
import { CompanyAccountEntity } from './entities/company-account.entity';
import { DuplicateEmailException, InvalidCredentialsException } from './exceptions/auth.exceptions';

function registerDto(company: string, email: string, password: string): RegisterDto {
  return plainToInstance(RegisterDto, { company, email, password });
}

function loginDto(email: string, password: string): LoginDto {
  return plainToInstance(LoginDto, { email, password });
}

describe('AuthService', () => {
  let dataDir: string;
  let module: TestingModule;
  let service: AuthService;
  let companyStore: CompanyStoreService;
  let accounts: Repository<CompanyAccountEntity>;

  beforeEach(async () => {
    dataDir = await createTempDataDir();
    const config = new ConfigService({
      dataDir,
      sessionSecret: 'test-secret',
      defaultFields: [{ nombre: 'descripcion', tipo: FieldType.TEXT }],
    });

    module = await Test.createTestingModule({
      imports: [
        TypeOrmModule.forRoot({
          type: 'better-sqlite3',
          database: ':memory:',
          entities: [CompanyAccountEntity],
          synchronize: true,
        }),
        TypeOrmModule.forFeature([CompanyAccountEntity]),
        JwtModule.register({ secret: 'test-secret' }),
      ],
      providers: [AuthService, CompanyStoreService, { provide: ConfigService, useValue: config }],
    }).compile();

    service = module.get<AuthService>(AuthService);
    companyStore = module.get<CompanyStoreService>(CompanyStoreService);
    accounts = module.get<Repository<CompanyAccountEntity>>(getRepositoryToken(CompanyAccountEntity));
  });

  afterEach(async () => {
    await module.close();
    await removeTempDataDir(dataDir);
  });

  it('registers an account with a hashed password and a provisioned store', async () => {
    const account = await service.register(registerDto(' Acme ', ' Compras@Acme.test ', 'test-password'));

    expect(account.companyName).toBe('Acme');
    expect(account.email).toBe('compras@acme.test');
    expect(account.passwordHash).not.toBe('test-password');
    expect(account.storageLocation).toBe(companyStore.locationFor(account.id));
    expect(await readdir(dataDir)).toEqual([`company_${account.id}.db`]);

    const campos = await companyStore.withStore(account.storageLocation, (manager) =>
      manager.query('SELECT nombre FROM campos'),
    );
    expect(campos).toEqual([{ nombre: 'descripcion' }]);
  });

  it('rejects an email that differs only in case without creating a store', async () => {
    await service.register(registerDto('Acme', 'a@x.com', 'test-password'));

    await expect(service.register(registerDto('Other', 'A@X.com', 'test-password'))).rejects.toBeInstanceOf(
      DuplicateEmailException,
    );
    expect(await accounts.count()).toBe(1);
    expect(await readdir(dataDir)).toHaveLength(1);
  });

  it('leaves no account behind when the store cannot be provisioned', async () => {
    jest.spyOn(companyStore, 'provision').mockRejectedValueOnce(new Error('disk full'));

    await expect(service.register(registerDto('Acme', 'a@x.com', 'test-password'))).rejects.toThrow('disk full');
    expect(await accounts.count()).toBe(0);
  });

  it('removes the store when the account row cannot be written', async () => {
    jest
      .spyOn(accounts, 'insert')
      .mockRejectedValueOnce(
        new QueryFailedError('INSERT INTO users', [], new Error('UNIQUE constraint failed: users.email')),
      );

    await expect(service.register(registerDto('Acme', 'a@x.com', 'test-password'))).rejects.toBeInstanceOf(
      DuplicateEmailException,
    );
    expect(await accounts.count()).toBe(0);
    expect(await readdir(dataDir)).toEqual([]);
  });

  it('keeps a registration that succeeds while another one fails', async () => {
    // Whichever registration provisions first fails after a delay
    jest.spyOn(companyStore, 'provision').mockImplementationOnce(
      () => new Promise<void>((_resolve, reject) => setTimeout(() => reject(new Error('disk full')), 200)),
    );

    const results = await Promise.allSettled([
      service.register(registerDto('Acme', 'a@x.com', 'test-password')),
      service.register(registerDto('Globex', 'b@x.com', 'test-password')),
    ]);

    const registered = results.flatMap((result) => (result.status === 'fulfilled' ? [result.value] : []));
    expect(results.filter((result) => result.status === 'rejected')).toHaveLength(1);
    expect(registered).toHaveLength(1);

    const rows = await accounts.find();
    expect(rows.map((row) => row.id)).toEqual([registered[0].id]);
    expect(await readdir(dataDir)).toEqual([`company_${registered[0].id}.db`]);
  });

  it('authenticates with the email in any case', async () => {
    const registered = await service.register(registerDto('Acme', 'a@x.com', 'test-password'));

    const account = await service.authenticate(loginDto('A@X.com', 'test-password'));

    expect(account.id).toBe(registered.id);
  });

  it('gives the same error for a wrong password and an unknown email', async () => {
    await service.register(registerDto('Acme', 'a@x.com', 'test-password'));

    await expect(service.authenticate(loginDto('a@x.com', 'wrong'))).rejects.toBeInstanceOf(
      InvalidCredentialsException,
    );
    await expect(service.authenticate(loginDto('nobody@x.com', 'test-password'))).rejects.toBeInstanceOf(
      InvalidCredentialsException,
    );
  });

  it('signs a session token carrying the company and its store', async () => {
    const registered = await service.register(registerDto('Acme', 'a@x.com', 'test-password'));

    const { account, sessionToken } = await service.signin(loginDto('a@x.com', 'test-password'));
    const payload = module.get<JwtService>(JwtService).verify(sessionToken);

    expect(account.id).toBe(registered.id);
    expect(payload).toMatchObject({
      sub: registered.id,
      companyName: 'Acme',
      storeLocation: registered.storageLocation,
    });
  });
});
