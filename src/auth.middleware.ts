import { Injectable, NestMiddleware, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NextFunction, Request } from 'express';

export const API_KEY_HEADER = 'x-api-key';

@Injectable()
export class AuthMiddleware implements NestMiddleware {
  private readonly apiKey: string | undefined;

  constructor(private readonly configService: ConfigService) {
    this.apiKey = this.configService.get<string>('API_KEY');
  }

  use(req: Pick<Request, 'headers'>, _res: unknown, next: NextFunction): void {
    // Open when no key is configured
    if (!this.apiKey) {
      next();
      return;
    }

    const provided = req.headers[API_KEY_HEADER];
    if (typeof provided !== 'string' || provided !== this.apiKey) {
      throw new UnauthorizedException(`Valid ${API_KEY_HEADER} header required`);
    }

    next();
  }
}
