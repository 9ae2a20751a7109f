import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { ParseController } from './parse.controller.js';

@Module({
  imports: [EngineModule],
  controllers: [ParseController],
})
export class ParseModule {}
