/* eslint-disable prettier/prettier */
import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { JwtService } from '@nestjs/jwt';
import { Repository } from 'typeorm';
import { randomUUID } from 'crypto';
import * as bcrypt from 'bcryptjs';
import { CompanyStoreService } from '../company-store/company-store.service';
import { isUniqueViolation } from '../common/utils/database-errors.util';
import { logStructured } from '../common/utils/logger.util';
import { RegisterDto } from './dtos/register.dto';
import { LoginDto } from './dtos/login.dto';
import { CompanyAccountEntity } from './entities/company-account.entity';
import { DuplicateEmailException, InvalidCredentialsException } from './exceptions/auth.exceptions';
import { SessionPayload } from './models/session';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @InjectRepository(CompanyAccountEntity)
    private readonly accountsRepository: Repository<CompanyAccountEntity>,
    private readonly jwtService: JwtService,
    private readonly companyStore: CompanyStoreService,
  ) {}

  /**
   * Creates the store first and the account row last, as a single insert. The
   * directory never holds a transaction across file I/O, and a failed insert
   * removes the store it was meant to own.
   */
  async register(registerDto: RegisterDto): Promise<CompanyAccountEntity> {
    const { company, email, password } = registerDto;

    if (await this.accountsRepository.existsBy({ email })) {
      throw new DuplicateEmailException();
    }

    const salt = await bcrypt.genSalt();
    const passwordHash = await bcrypt.hash(password, salt);

    const id = randomUUID();
    const account = this.accountsRepository.create({
      id,
      companyName: company,
      email,
      passwordHash,
      storageLocation: this.companyStore.locationFor(id),
    });

    await this.companyStore.provision(account.storageLocation);

    try {
      await this.accountsRepository.insert(account);
    } catch (err) {
      await this.companyStore.discard(account.storageLocation);
      if (isUniqueViolation(err)) {
        throw new DuplicateEmailException();
      }
      throw err;
    }

    logStructured(this.logger, 'log', 'ACCOUNT_REGISTERED', `Company '${company}' registered`, {
      accountId: account.id,
      email,
    });
    return account;
  }

  async authenticate(loginDto: LoginDto): Promise<CompanyAccountEntity> {
    const { email, password } = loginDto;

    const account = await this.accountsRepository.findOne({ where: { email } });
    if (!account || !(await account.validatePassword(password))) {
      logStructured(this.logger, 'warn', 'LOGIN_FAILED', 'Invalid login attempt', { email });
      throw new InvalidCredentialsException();
    }

    return account;
  }

  async signin(loginDto: LoginDto): Promise<{ account: CompanyAccountEntity; sessionToken: string }> {
    const account = await this.authenticate(loginDto);

    const payload: SessionPayload = {
      sub: account.id,
      companyName: account.companyName,
      storeLocation: account.storageLocation,
    };
    const sessionToken = await this.jwtService.signAsync(payload);

    logStructured(this.logger, 'log', 'LOGIN', `Company '${account.companyName}' signed in`, {
      accountId: account.id,
    });
    return { account, sessionToken };
  }
}
