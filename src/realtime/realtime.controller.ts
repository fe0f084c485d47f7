import { Controller, Get, Query, Res, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Response } from 'express';
import { secretsMatch } from '../common/guards/shared-secret.guard';
import { LoggerService } from '../logger/logger.service';
import { RealtimeService } from './realtime.service';

@Controller('api/realtime')
export class RealtimeController {
  constructor(
    private realtimeService: RealtimeService,
    private configService: ConfigService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('RealtimeController');
  }

  @Get('events')
  streamEvents(@Query('key') key: string | undefined, @Res() res: Response): void {
    // EventSource cannot send headers, so the API key travels as a query parameter
    const expected = this.configService.get<string>('API_KEY') || '';
    if (expected && !secretsMatch(key || '', expected)) {
      throw new UnauthorizedException('Invalid key');
    }

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering

    res.write(`data: ${JSON.stringify({ type: 'connected', timestamp: new Date().toISOString() })}\n\n`);

    const subscription = this.realtimeService.getEventStream().subscribe((event) => {
      const message = JSON.stringify({
        type: event.type,
        data: event.data,
        timestamp: event.timestamp.toISOString(),
      });
      if (!res.write(`event: ${event.type}\ndata: ${message}\n\n`)) {
        this.logger.debug('SSE client is slow to drain', { type: event.type });
      }
    });

    res.on('close', () => {
      subscription.unsubscribe();
      res.end();
    });
  }
}
