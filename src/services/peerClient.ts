import axios from 'axios';
import { z } from 'zod';
import { config } from '../config';
import { PeerUnreachableError } from '../utils/errors';
import { hostRecordSchema } from '../validators/hostValidator';
import { Host } from '../types';

const identitySchema = z.object({
  id: z.string().default(''),
  version: z.string().default(''),
  hostname: z.string().default(''),
});

export type PeerIdentity = z.infer<typeof identitySchema>;

export interface PeerClientOptions {
  /** Timeout for self-description and identification calls */
  requestTimeoutMs: number;
  /** Timeout for roster deliveries */
  pushTimeoutMs: number;
}

/**
 * HTTP transport to the same endpoints on other fleet nodes
 */
export class PeerClient {
  private readonly options: PeerClientOptions;

  constructor(options: Partial<PeerClientOptions> = {}) {
    this.options = {
      requestTimeoutMs: config.network.peerTimeoutMs,
      pushTimeoutMs: config.network.pushTimeoutMs,
      ...options,
    };
  }

  private baseUrl(ip: string, port: number): string {
    return `http://${ip}:${port}`;
  }

  /**
   * The peer's own host record
   */
  async fetchSelfDescription(ip: string, port: number, signal?: AbortSignal): Promise<Host> {
    try {
      const response = await axios.get<unknown>(`${this.baseUrl(ip, port)}/api/host/local`, {
        timeout: this.options.requestTimeoutMs,
        signal,
      });
      return hostRecordSchema.parse(response.data);
    } catch (error) {
      throw new PeerUnreachableError(ip, error);
    }
  }

  /**
   * Lightweight identification offered by older peers
   */
  async fetchIdentity(ip: string, port: number, signal?: AbortSignal): Promise<PeerIdentity> {
    try {
      const response = await axios.get<unknown>(`${this.baseUrl(ip, port)}/api/version`, {
        timeout: this.options.requestTimeoutMs,
        signal,
      });
      return identitySchema.parse(response.data);
    } catch (error) {
      throw new PeerUnreachableError(ip, error);
    }
  }

  /**
   * Deliver a roster to the peer's receive endpoint.
   */
  async sendRoster(
    ip: string,
    port: number,
    hosts: Host[],
    options: { merge: boolean; signal?: AbortSignal }
  ): Promise<void> {
    try {
      await axios.post(`${this.baseUrl(ip, port)}/api/hosts/receive`, hosts, {
        params: options.merge ? { merge: 'true' } : undefined,
        timeout: this.options.pushTimeoutMs,
        signal: options.signal,
        headers: { 'Content-Type': 'application/json' },
      });
    } catch (error) {
      throw new PeerUnreachableError(ip, error);
    }
  }
}

export default PeerClient;
