import { Module } from '@nestjs/common';
import { VadService } from './vad.service';

@Module({
  providers: [VadService],
  exports: [VadService],
})
export class SegmenterModule {}
