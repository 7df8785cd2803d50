import { Module } from '@nestjs/common';
import { Aria2Client } from './aria2.client';

@Module({
  providers: [Aria2Client],
  exports: [Aria2Client],
})
export class Aria2Module {}
