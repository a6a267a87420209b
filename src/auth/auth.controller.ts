/* eslint-disable prettier/prettier */
import { Body, Controller, Get, Post, Redirect, Render, Res } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { CookieOptions } from 'express';
import { OnErrorRedirect } from '../common/decorators/on-error-redirect.decorator';
import { Flashes } from '../common/flash/flashes.decorator';
import { FlashMessage, FlashResponse, pushFlash } from '../common/flash/flash.util';
import { AuthService } from './auth.service';
import { LoginDto } from './dtos/login.dto';
import { RegisterDto } from './dtos/register.dto';
import { SESSION_COOKIE } from './models/session';

const SESSION_COOKIE_OPTIONS: CookieOptions = { httpOnly: true, sameSite: 'lax', path: '/' };

@ApiTags('Auth')
@Controller()
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Get('register')
  @Render('register')
  registerForm(@Flashes() flashes: FlashMessage[]) {
    return { title: 'Crear cuenta', flashes };
  }

  @Post('register')
  @Redirect('/login')
  @OnErrorRedirect('/register')
  async register(
    @Body() registerDto: RegisterDto,
    @Res({ passthrough: true }) res: FlashResponse,
  ): Promise<void> {
    await this.authService.register(registerDto);
    pushFlash(res, 'success', 'Cuenta creada. Inicia sesión.');
  }

  @Get('login')
  @Render('login')
  loginForm(@Flashes() flashes: FlashMessage[]) {
    return { title: 'Iniciar sesión', flashes };
  }

  @Post('login')
  @Redirect('/')
  @OnErrorRedirect('/login')
  async login(
    @Body() loginDto: LoginDto,
    @Res({ passthrough: true }) res: FlashResponse,
  ): Promise<void> {
    const { account, sessionToken } = await this.authService.signin(loginDto);
    res.cookie(SESSION_COOKIE, sessionToken, SESSION_COOKIE_OPTIONS);
    pushFlash(res, 'success', `Bienvenido, ${account.companyName}`);
  }

  @Get('logout')
  @Redirect('/login')
  logout(@Res({ passthrough: true }) res: FlashResponse): void {
    res.clearCookie(SESSION_COOKIE, SESSION_COOKIE_OPTIONS);
    pushFlash(res, 'info', 'Sesión cerrada');
  }
}
