import { PasswordHasher } from '../auth/passwords';
import { TokenIssuer } from '../auth/tokens';
import type { AuthenticatedContext } from '../context';
import { InvalidCredentialsError } from '../errors';
import type { TokenStore, UserStore } from '../stores/types';

export class AuthService {
  constructor(
    private readonly users: UserStore,
    private readonly tokens: TokenStore,
    private readonly issuer: TokenIssuer,
    private readonly passwords: PasswordHasher
  ) {}

  async login(email: string, password: string): Promise<{ auth_token: string }> {
    const user = await this.users.findByEmail(email);
    if (!user) {
      throw new InvalidCredentialsError();
    }

    const isValid = await this.passwords.verify(password, user.password_hash);
    if (!isValid) {
      throw new InvalidCredentialsError();
    }

    const { token, tokenHash, expiresAt } = this.issuer.issue(user.id);
    await this.tokens.save(tokenHash, user.id, expiresAt);
    return { auth_token: token };
  }

  async logout(ctx: AuthenticatedContext): Promise<void> {
    await this.tokens.remove(ctx.tokenHash);
  }
}
