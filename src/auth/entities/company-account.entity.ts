/* eslint-disable prettier/prettier */
import { Column, CreateDateColumn, Entity, PrimaryColumn, Unique } from 'typeorm';
import * as bcrypt from 'bcryptjs';

/**
 * Directory entry of a registered company. Lives in users.db only; the
 * company's own data sits in the store file at `storageLocation`.
 */
@Entity('users')
@Unique(['email'])
export class CompanyAccountEntity {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Column({ name: 'company_name', type: 'text' })
  companyName!: string;

  @Column({ type: 'text' })
  email!: string;

  @Column({ name: 'password_hash', type: 'text' })
  passwordHash!: string;

  @Column({ name: 'db_path', type: 'text' })
  storageLocation!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  async validatePassword(password: string): Promise<boolean> {
    return bcrypt.compare(password, this.passwordHash);
  }
}
