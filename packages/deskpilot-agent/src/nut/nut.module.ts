import { Module } from '@nestjs/common';
import {
  BUSY_CURSOR_PROBE,
  INPUT_CAPABILITY,
  SCREEN_CAPTURE,
  WINDOW_CONTEXT,
} from '../actions/input.capability';
import { NutService } from './nut.service';

@Module({
  providers: [
    NutService,
    { provide: INPUT_CAPABILITY, useExisting: NutService },
    { provide: SCREEN_CAPTURE, useExisting: NutService },
    { provide: BUSY_CURSOR_PROBE, useExisting: NutService },
    { provide: WINDOW_CONTEXT, useExisting: NutService },
  ],
  exports: [
    NutService,
    INPUT_CAPABILITY,
    SCREEN_CAPTURE,
    BUSY_CURSOR_PROBE,
    WINDOW_CONTEXT,
  ],
})
export class NutModule {}
