import { Controller, Get } from '@nestjs/common';
import { AppConfigService } from './config/app-config.service.js';

export type RootStatus = {
  message: string;
  status: 'ok';
  version: string;
};

@Controller()
export class AppController {
  constructor(private readonly configService: AppConfigService) {}

  @Get()
  getRoot(): RootStatus {
    return {
      message: 'Service request parser is live.',
      status: 'ok',
      version: this.configService.get().version,
    };
  }
}
