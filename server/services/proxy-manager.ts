import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { ProxyDirectoryError } from '../errors';
import { log } from '../log';
import { pickRandom, retryWithBackoff } from './scraper-utils';

/**
 * Proxy Manager - egress identities from the proxy directory.
 * The list is fetched fresh for every selection, so workers share no cursor.
 */

export interface EgressIdentity {
  host: string;
  port: number;
  username: string;
  password: string;
}

export interface ProxyDirectory {
  pickIdentity(): Promise<EgressIdentity>;
}

const directoryResponseSchema = z.object({
  results: z.array(z.object({
    username: z.string(),
    password: z.string(),
    proxy_address: z.string(),
    port: z.coerce.number().int().positive(),
  })),
});

export function proxyUrl(identity: EgressIdentity): string {
  return `http://${encodeURIComponent(identity.username)}:${encodeURIComponent(identity.password)}@${identity.host}:${identity.port}`;
}

export interface WebshareDirectoryOptions {
  url: string;
  token?: string;
  attempts?: number;
  baseDelayMs?: number;
  http?: AxiosInstance;
}

export class WebshareProxyDirectory implements ProxyDirectory {
  private http: AxiosInstance;
  private attempts: number;
  private baseDelayMs: number;

  constructor(private readonly options: WebshareDirectoryOptions) {
    this.http = options.http ?? axios.create({ timeout: 15000 });
    this.attempts = options.attempts ?? 4;
    this.baseDelayMs = options.baseDelayMs ?? 2000;
  }

  async listIdentities(): Promise<EgressIdentity[]> {
    const headers: Record<string, string> = {};
    if (this.options.token) {
      headers['Authorization'] = `Token ${this.options.token}`;
    }

    const response = await this.http.get<unknown>(this.options.url, { headers });
    const parsed = directoryResponseSchema.parse(response.data);
    return parsed.results.map(p => ({
      host: p.proxy_address,
      port: p.port,
      username: p.username,
      password: p.password,
    }));
  }

  async pickIdentity(): Promise<EgressIdentity> {
    try {
      return await retryWithBackoff(async () => {
        const identity = pickRandom(await this.listIdentities());
        if (!identity) {
          throw new ProxyDirectoryError('Proxy directory returned no identities');
        }
        return identity;
      }, {
        attempts: this.attempts,
        baseDelayMs: this.baseDelayMs,
        onRetry: (attempt, error, delayMs) => {
          const message = error instanceof Error ? error.message : String(error);
          log(`Directory attempt ${attempt} failed (${message}), retrying in ${delayMs}ms`, 'PROXY');
        },
      });
    } catch (error) {
      if (error instanceof ProxyDirectoryError) throw error;
      throw new ProxyDirectoryError(`Proxy directory unavailable after ${this.attempts} attempts`, { cause: error });
    }
  }
}
