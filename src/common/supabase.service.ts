import { Injectable, Logger, InternalServerErrorException, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient, SupabaseClient, WebSocketLike } from '@supabase/supabase-js';
import { errorMessage, errorStack } from './errors';

export interface SupabaseClientOverrides {
  fetch?: typeof fetch;
}

/**
 * Realtime transport for this REST-only service. supabase-js wants a WebSocket constructor
 * when the client is created and Node 20 has no global one; no channel is ever subscribed,
 * so opening a socket is an error.
 */
export class RealtimeDisabledSocket implements WebSocketLike {
  readonly CONNECTING = 0;
  readonly OPEN = 1;
  readonly CLOSING = 2;
  readonly CLOSED = 3;
  readonly readyState = 3;
  readonly url: string;
  readonly protocol = '';
  onopen = null;
  onmessage = null;
  onclose = null;
  onerror = null;

  constructor(address: string | URL) {
    this.url = String(address);
    throw new Error(`Realtime is disabled; refusing to open ${this.url}`);
  }

  close(): void {}

  send(): void {}

  addEventListener(): void {}

  removeEventListener(): void {}
}

/** Server-side client: no session persistence, no realtime socket. */
export function createServerClient(url: string, key: string, overrides: SupabaseClientOverrides = {}): SupabaseClient {
  return createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false },
    realtime: { transport: RealtimeDisabledSocket },
    global: overrides.fetch ? { fetch: overrides.fetch } : {},
  });
}

@Injectable()
export class SupabaseService implements OnApplicationShutdown {
  private readonly logger = new Logger(SupabaseService.name);
  private _supabase?: SupabaseClient;
  private _supabaseService?: SupabaseClient;
  private initializationPromise: Promise<void> | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly overrides: SupabaseClientOverrides = {},
  ) {}

  async initialize(): Promise<void> {
    if (this.initializationPromise) {
      return this.initializationPromise;
    }

    this.initializationPromise = (async () => {
      const supabaseUrl = this.configService.get<string>('SUPABASE_URL');
      const supabaseAnonKey = this.configService.get<string>('SUPABASE_ANON_KEY');
      const supabaseServiceKey = this.configService.get<string>('SUPABASE_SERVICE_ROLE_KEY');

      if (!supabaseUrl || !supabaseAnonKey) {
        this.logger.error('SUPABASE_URL or SUPABASE_ANON_KEY missing in config! Supabase client NOT initialized.');
        throw new InternalServerErrorException('Supabase config missing for client initialization.');
      }

      try {
        this._supabase = createServerClient(supabaseUrl, supabaseAnonKey, this.overrides);
        this.logger.log('Supabase client (anon key) initialized.');

        if (supabaseServiceKey) {
          this._supabaseService = createServerClient(supabaseUrl, supabaseServiceKey, this.overrides);
          this.logger.log('Supabase service client (service_role key) initialized.');
        } else {
          this.logger.warn('SUPABASE_SERVICE_ROLE_KEY not set; queries run with the anon key and are subject to RLS.');
        }
      } catch (error) {
        this.logger.error(`Failed to initialize Supabase clients: ${errorMessage(error)}`, errorStack(error));
        throw new InternalServerErrorException(`Failed to initialize Supabase clients: ${errorMessage(error)}`);
      }
    })();

    return this.initializationPromise;
  }

  /** Service-role client when configured, anon client otherwise. */
  getClient(): SupabaseClient {
    const client = this._supabaseService ?? this._supabase;
    if (!client) {
      this.logger.error('Attempted to get Supabase client, but it is not initialized.');
      throw new InternalServerErrorException('Supabase client is not available. Initialization might have failed or is not complete.');
    }
    return client;
  }

  // Realtime is disabled, so there are no channels to remove; dropping the references is enough.
  onApplicationShutdown(signal?: string): void {
    this._supabase = undefined;
    this._supabaseService = undefined;
    this.initializationPromise = null;
    this.logger.log(`Supabase clients released${signal ? ` (${signal})` : ''}.`);
  }
}
