import { Body, Controller, HttpCode, HttpStatus, Post, UseGuards } from '@nestjs/common';
import { WebhookSecretGuard } from '../common/guards/shared-secret.guard';
import { SignalsService } from './signals.service';

@Controller('api/webhook')
@UseGuards(WebhookSecretGuard)
export class SignalsController {
  constructor(private signalsService: SignalsService) {}

  // Duplicates and ignored signals are acknowledged with 200 so the sender stops retrying
  @Post()
  @HttpCode(HttpStatus.OK)
  receive(@Body() body: unknown) {
    return this.signalsService.handle(body);
  }
}
