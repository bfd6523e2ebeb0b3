/** Token returned by register and login, named after the OAuth2 token response. */
export class AuthResponseDto {
  readonly tokenType = 'Bearer' as const;

  constructor(
    readonly accessToken: string,
    readonly expiresIn: number,
  ) {}
}
