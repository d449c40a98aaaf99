import { Injectable } from '@nestjs/common';
import { ClockPort } from '../../../application/ports/output/clock.port';

@Injectable()
export class SystemClockAdapter implements ClockPort {
  now(): number {
    return Date.now();
  }
}
