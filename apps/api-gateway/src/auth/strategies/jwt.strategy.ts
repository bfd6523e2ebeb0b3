import { Injectable, Logger } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { Strategy, ExtractJwt } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { User } from '@biocurate/database';
import { AccountUnavailableException } from '../exceptions';
import type { JwtPayload, RequestUser } from '../interfaces';

/**
 * Verifies the bearer token's signature and expiry, then re-reads the user
 * so that `isAdmin` and `isActive` come from the row, never from the token.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  private readonly logger = new Logger(JwtStrategy.name);

  constructor(
    configService: ConfigService,
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {
    const secret = configService.get<string>('JWT_SECRET');

    if (!secret) {
      throw new Error('JWT_SECRET is not defined in environment variables.');
    }

    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: secret,
    });
  }

  async validate(payload: JwtPayload): Promise<RequestUser> {
    const user = await this.userRepository.findOne({
      where: { id: payload.sub },
      select: ['id', 'email', 'isActive', 'isAdmin'],
    });

    if (!user) {
      this.logger.warn(`Token for deleted user ${payload.sub} presented`);
      throw new AccountUnavailableException('deleted');
    }
    if (!user.isActive) {
      this.logger.warn(`Token for deactivated user ${payload.sub} presented`);
      throw new AccountUnavailableException('deactivated');
    }

    return { userId: user.id, email: user.email, isAdmin: user.isAdmin };
  }
}
