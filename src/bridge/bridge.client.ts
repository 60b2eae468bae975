import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import fetch, { Response } from 'node-fetch';
import { z } from 'zod';

export type BridgeMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export class BridgeRequestError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'BridgeRequestError';
  }
}

/**
 * JSON over HTTP to the process that owns the messaging-platform sessions.
 */
@Injectable()
export class BridgeClient {
  private readonly logger = new Logger(BridgeClient.name);
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = this.configService
      .get<string>('PLATFORM_BRIDGE_URL', 'http://127.0.0.1:8080')
      .replace(/\/$/, '');
    this.apiKey = this.configService.get<string>('PLATFORM_BRIDGE_API_KEY');
    this.timeoutMs = this.configService.get<number>('BRIDGE_TIMEOUT_MS', 15_000);
  }

  /**
   * @returns the parsed response, or `null` for an empty (204) answer
   */
  async request<T extends z.ZodTypeAny>(
    method: BridgeMethod,
    path: string,
    schema: T,
    body?: unknown,
  ): Promise<z.output<T> | null> {
    const payload = await this.send(method, path, body);
    if (payload === null) {
      return null;
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new BridgeRequestError(`Unexpected response from ${method} ${path}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  /** For calls whose answer carries nothing we need. */
  async call(method: BridgeMethod, path: string, body?: unknown): Promise<void> {
    await this.send(method, path, body);
  }

  private async send(method: BridgeMethod, path: string, body?: unknown): Promise<unknown> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.apiKey) {
      headers['x-api-key'] = this.apiKey;
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        timeout: this.timeoutMs,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new BridgeRequestError(`${method} ${path} failed: ${reason}`);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      throw new BridgeRequestError(
        `${method} ${path} returned ${response.status}${detail ? `: ${detail.slice(0, 200)}` : ''}`,
        response.status,
      );
    }

    if (response.status === 204) {
      return null;
    }

    const text = await response.text();
    if (text.trim().length === 0) {
      return null;
    }

    try {
      return JSON.parse(text);
    } catch {
      this.logger.debug(`Non-JSON body from ${method} ${path}: ${text.slice(0, 100)}`);
      throw new BridgeRequestError(`${method} ${path} returned a body that is not JSON`);
    }
  }
}
