import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { getConfig, requireSetting } from '../../utils/config';
import { AuthenticationError, ValidationError } from '../../utils/errors';

/**
 * Token issued after a successful login or an immediately confirmed registration.
 */
export interface AuthSession {
  access_token: string;
  token_type: 'bearer';
  user_id: string;
  email: string;
}

/**
 * Outcome of a registration: either a ready session, or a pending email confirmation.
 */
export type RegistrationResult =
  | { status: 'active'; session: AuthSession }
  | { status: 'pending_confirmation'; message: string };

export const CONFIRMATION_PENDING_MESSAGE =
  'Registration successful. Please check your email to confirm your account.';

/**
 * Identity collaborator. Resolves bearer tokens to the id of the user owning the data.
 */
export interface IdentityProvider {
  /**
   * @throws {AuthenticationError} When the token is missing, expired or rejected
   */
  getUserId(accessToken: string): Promise<string>;
  register(email: string, password: string): Promise<RegistrationResult>;
  /**
   * @throws {AuthenticationError} On wrong credentials
   */
  login(email: string, password: string): Promise<AuthSession>;
}

/**
 * IdentityProvider backed by Supabase Auth.
 *
 * @class SupabaseIdentityProvider
 */
export class SupabaseIdentityProvider implements IdentityProvider {
  private readonly supabase: SupabaseClient;

  constructor(supabase?: SupabaseClient) {
    this.supabase = supabase ?? SupabaseIdentityProvider.createFromConfig();
  }

  private static createFromConfig(): SupabaseClient {
    const config = getConfig();
    return createClient(
      requireSetting(config.supabaseUrl, 'SUPABASE_URL'),
      requireSetting(config.supabaseKey, 'SUPABASE_KEY'),
      { auth: { persistSession: false, autoRefreshToken: false } },
    );
  }

  async getUserId(accessToken: string): Promise<string> {
    const { data, error } = await this.supabase.auth.getUser(accessToken);
    if (error || !data.user) {
      throw new AuthenticationError();
    }
    return data.user.id;
  }

  async register(email: string, password: string): Promise<RegistrationResult> {
    const { data, error } = await this.supabase.auth.signUp({ email, password });
    if (error) {
      throw new ValidationError(`Registration failed: ${error.message}`);
    }
    if (!data.user) {
      throw new ValidationError('Registration failed');
    }
    if (!data.session) {
      return { status: 'pending_confirmation', message: CONFIRMATION_PENDING_MESSAGE };
    }

    return {
      status: 'active',
      session: {
        access_token: data.session.access_token,
        token_type: 'bearer',
        user_id: data.user.id,
        email: data.user.email ?? email,
      },
    };
  }

  async login(email: string, password: string): Promise<AuthSession> {
    const { data, error } = await this.supabase.auth.signInWithPassword({ email, password });
    if (error || !data.user || !data.session) {
      throw new AuthenticationError('Invalid credentials');
    }

    return {
      access_token: data.session.access_token,
      token_type: 'bearer',
      user_id: data.user.id,
      email: data.user.email ?? email,
    };
  }
}
