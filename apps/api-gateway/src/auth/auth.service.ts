import { Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import * as bcrypt from 'bcrypt';
import { isUniqueViolation, User } from '@biocurate/database';
import { RegisterDto, LoginDto, AuthResponseDto, UserProfileDto } from './dto';
import {
  AccountUnavailableException,
  EmailAlreadyRegisteredException,
  InvalidCredentialsException,
} from './exceptions';
import type { JwtPayload } from './interfaces';

/** bcrypt cost factor */
const BCRYPT_SALT_ROUNDS = 12;

/** Accounts are keyed by the trimmed, lower-cased address. */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/**
 * AuthService — curator accounts and their access tokens.
 *
 * New accounts are active and not admin; the admin flag is granted in the
 * database only. Every login failure carries the same message, and an
 * unknown email costs the same bcrypt work as a wrong password.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    private readonly jwtService: JwtService,
    private readonly configService: ConfigService,
  ) {}

  async register(dto: RegisterDto): Promise<AuthResponseDto> {
    const email = normalizeEmail(dto.email);

    const existing = await this.userRepository.findOne({
      where: { email },
      select: ['id'],
    });
    if (existing) {
      throw new EmailAlreadyRegisteredException(email);
    }

    const passwordHash = await bcrypt.hash(dto.password, BCRYPT_SALT_ROUNDS);

    let user: User;
    try {
      user = await this.userRepository.save(
        this.userRepository.create({ email, passwordHash, fullName: dto.fullName.trim() }),
      );
    } catch (err: unknown) {
      // A concurrent registration won between the lookup and the insert
      if (isUniqueViolation(err)) {
        throw new EmailAlreadyRegisteredException(email);
      }
      throw err;
    }

    this.logger.log(`Curator registered: ${user.id} (${user.email})`);
    return this.issueToken(user);
  }

  async login(dto: LoginDto): Promise<AuthResponseDto> {
    const user = await this.userRepository.findOne({
      where: { email: normalizeEmail(dto.email) },
      select: ['id', 'email', 'passwordHash', 'isActive'],
    });

    if (!user) {
      await bcrypt.hash(dto.password, BCRYPT_SALT_ROUNDS);
      throw new InvalidCredentialsException();
    }

    const passwordMatches = await bcrypt.compare(dto.password, user.passwordHash);
    if (!passwordMatches || !user.isActive) {
      throw new InvalidCredentialsException();
    }

    this.logger.log(`Curator logged in: ${user.id}`);
    return this.issueToken(user);
  }

  /** @throws AccountUnavailableException when the row went away after the guard ran */
  async getProfile(userId: string): Promise<UserProfileDto> {
    const user = await this.userRepository.findOne({ where: { id: userId } });
    if (!user) {
      this.logger.error(`Profile requested for deleted user ${userId}`);
      throw new AccountUnavailableException('deleted');
    }
    return UserProfileDto.fromEntity(user);
  }

  // ── Private helpers ──────────────────────────────────────

  private issueToken(user: Pick<User, 'id' | 'email'>): AuthResponseDto {
    const payload: JwtPayload = { sub: user.id, email: user.email };
    const expiresIn = Number(this.configService.get<string | number>('JWT_EXPIRATION', 3600));
    return new AuthResponseDto(this.jwtService.sign(payload), expiresIn);
  }
}
