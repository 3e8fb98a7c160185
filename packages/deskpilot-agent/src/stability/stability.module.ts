import { Module } from '@nestjs/common';
import { NutModule } from '../nut/nut.module';
import { StabilityService } from './stability.service';

@Module({
  imports: [NutModule],
  providers: [StabilityService],
  exports: [StabilityService],
})
export class StabilityModule {}
