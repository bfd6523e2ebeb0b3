import { User } from '@biocurate/database';

/** GET /auth/me. Built from the entity field by field; the password hash is left out. */
export class UserProfileDto {
  private constructor(
    readonly id: string,
    readonly email: string,
    readonly fullName: string,
    readonly isActive: boolean,
    readonly isAdmin: boolean,
    readonly createdAt: string,
  ) {}

  static fromEntity(user: User): UserProfileDto {
    return new UserProfileDto(
      user.id,
      user.email,
      user.fullName,
      user.isActive,
      user.isAdmin,
      user.createdAt.toISOString(),
    );
  }
}
