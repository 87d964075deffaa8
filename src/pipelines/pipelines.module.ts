import { Module } from '@nestjs/common';
import { ReplacingMergeReader } from './load/replacing-merge.reader';

@Module({
  providers: [ReplacingMergeReader],
  exports: [ReplacingMergeReader],
})
export class PipelinesModule {}
