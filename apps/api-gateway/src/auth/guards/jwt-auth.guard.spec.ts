import { UnauthorizedException } from '@nestjs/common';
import { AccountUnavailableException } from '../exceptions';
import { JwtAuthGuard, tokenFailureMessage } from './jwt-auth.guard';

describe('JwtAuthGuard', () => {
  const guard = new JwtAuthGuard();
  const user = { userId: 'user-1', email: 'curator@example.org', isAdmin: false };

  const named = (name: string, message: string): Error =>
    Object.assign(new Error(message), { name });

  describe('tokenFailureMessage', () => {
    it('should name a missing header', () => {
      expect(tokenFailureMessage(new Error('No auth token'))).toBe('Missing bearer token');
      expect(tokenFailureMessage(undefined)).toBe('Missing bearer token');
    });

    it('should explain an expired token', () => {
      expect(tokenFailureMessage(named('TokenExpiredError', 'jwt expired'))).toBe(
        'Access token has expired; log in again',
      );
    });

    it('should fall back to the verifier message for other failures', () => {
      expect(tokenFailureMessage(named('Error', 'jwt audience invalid'))).toBe(
        'jwt audience invalid',
      );
    });
  });

  describe('handleRequest', () => {
    it('should pass the accepted user through', () => {
      expect(guard.handleRequest(null, user, undefined)).toBe(user);
    });

    it('should answer 401 with the token failure', () => {
      expect(() =>
        guard.handleRequest(null, false, named('JsonWebTokenError', 'invalid signature')),
      ).toThrow(new UnauthorizedException('Access token is not valid'));
    });

    it('should keep the strategy error for a deactivated account', () => {
      const err = new AccountUnavailableException('deactivated');

      expect(() => guard.handleRequest(err, false, undefined)).toThrow(err);
    });
  });
});
