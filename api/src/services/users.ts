import { PasswordHasher } from '../auth/passwords';
import type { AuthenticatedContext, RequestContext } from '../context';
import {
  InvalidSelfReferenceError,
  NotFoundError,
  UniqueConstraintError,
  ValidationError,
} from '../errors';
import { decodeImageDataUri } from '../media/images';
import type { MediaStorage } from '../media/storage';
import type { PageRequest, PageResult, RecipeStore, UserRecord, UserStore } from '../stores/types';
import type { RegistrationInput } from '../validation';
import { type AuthorView, type PublicUserView, publicUserView, shortRecipeView, type UserView, userView } from '../views';
import { addMembership, removeMembership } from './membership';

const AVATAR_FOLDER = 'users/avatars';

const UNIQUE_FIELDS: Record<string, { field: string; message: string }> = {
  users_email_key: { field: 'email', message: 'A user with this email already exists' },
  users_username_key: { field: 'username', message: 'A user with this username already exists' },
};

const SUBSCRIPTION_MESSAGES = {
  alreadyExists: 'You are already subscribed to this user',
  notFound: 'You are not subscribed to this user',
};

export class UserService {
  constructor(
    private readonly users: UserStore,
    private readonly recipes: RecipeStore,
    private readonly passwords: PasswordHasher,
    private readonly media: MediaStorage
  ) {}

  async register(input: RegistrationInput): Promise<PublicUserView> {
    const passwordHash = await this.passwords.hash(input.password);
    try {
      const user = await this.users.create({
        email: input.email,
        username: input.username,
        first_name: input.first_name,
        last_name: input.last_name,
        password_hash: passwordHash,
      });
      return publicUserView(user);
    } catch (error) {
      if (error instanceof UniqueConstraintError && UNIQUE_FIELDS[error.constraint]) {
        const { field, message } = UNIQUE_FIELDS[error.constraint];
        throw ValidationError.forField(field, message);
      }
      throw error;
    }
  }

  async list(ctx: RequestContext, page: PageRequest): Promise<PageResult<UserView>> {
    const { count, rows } = await this.users.list(page);
    return { count, rows: await this.present(ctx, rows) };
  }

  async get(ctx: RequestContext, id: string): Promise<UserView> {
    const [view] = await this.present(ctx, [await this.requireUser(id)]);
    return view;
  }

  async me(ctx: AuthenticatedContext): Promise<UserView> {
    return userView(ctx.user, false);
  }

  async setAvatar(ctx: AuthenticatedContext, dataUri: string): Promise<{ avatar: string }> {
    const image = decodeImageDataUri(dataUri, 'avatar');
    const url = await this.media.save(AVATAR_FOLDER, image);
    await this.users.updateAvatar(ctx.user.id, url);
    if (ctx.user.avatar) {
      await this.media.remove(ctx.user.avatar);
    }
    return { avatar: url };
  }

  async deleteAvatar(ctx: AuthenticatedContext): Promise<void> {
    if (!ctx.user.avatar) return;
    await this.users.updateAvatar(ctx.user.id, null);
    await this.media.remove(ctx.user.avatar);
  }

  async setPassword(ctx: AuthenticatedContext, currentPassword: string, newPassword: string): Promise<void> {
    const isValid = await this.passwords.verify(currentPassword, ctx.user.password_hash);
    if (!isValid) {
      throw ValidationError.forField('current_password', 'Current password is incorrect');
    }
    await this.users.updatePassword(ctx.user.id, await this.passwords.hash(newPassword));
  }

  async subscriptions(
    ctx: AuthenticatedContext,
    page: PageRequest,
    recipesLimit: number | null
  ): Promise<PageResult<AuthorView>> {
    const { count, rows } = await this.users.listFollowed(ctx.user.id, page);
    const counts = await this.recipes.countByAuthors(rows.map((u) => u.id));

    const results = await Promise.all(
      rows.map((author) => this.authorView(author, true, recipesLimit, counts.get(author.id) ?? 0))
    );
    return { count, rows: results };
  }

  async subscribe(ctx: AuthenticatedContext, authorId: string, recipesLimit: number | null): Promise<AuthorView> {
    const author = await this.requireUser(authorId);
    if (author.id === ctx.user.id) {
      throw new InvalidSelfReferenceError('You cannot subscribe to yourself');
    }

    await addMembership(this.users.subscriptions, ctx.user.id, author.id, SUBSCRIPTION_MESSAGES);

    const counts = await this.recipes.countByAuthors([author.id]);
    return this.authorView(author, true, recipesLimit, counts.get(author.id) ?? 0);
  }

  async unsubscribe(ctx: AuthenticatedContext, authorId: string): Promise<void> {
    const author = await this.requireUser(authorId);
    if (author.id === ctx.user.id) {
      throw new InvalidSelfReferenceError('You cannot unsubscribe from yourself');
    }

    await removeMembership(this.users.subscriptions, ctx.user.id, author.id, SUBSCRIPTION_MESSAGES);
  }

  /** `is_subscribed` is relative to the caller and false for anonymous callers. */
  async present(ctx: RequestContext, users: UserRecord[]): Promise<UserView[]> {
    const subscribed = ctx.user
      ? await this.users.subscriptions.targetsOf(ctx.user.id, users.map((u) => u.id))
      : new Set<string>();
    return users.map((u) => userView(u, subscribed.has(u.id)));
  }

  private async requireUser(id: string): Promise<UserRecord> {
    const user = await this.users.findById(id);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return user;
  }

  private async authorView(
    author: UserRecord,
    isSubscribed: boolean,
    recipesLimit: number | null,
    recipesCount: number
  ): Promise<AuthorView> {
    const recipes = await this.recipes.listByAuthor(author.id, recipesLimit);
    return {
      ...userView(author, isSubscribed),
      recipes: recipes.map(shortRecipeView),
      recipes_count: recipesCount,
    };
  }
}
