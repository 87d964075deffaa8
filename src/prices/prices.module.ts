import { Module } from '@nestjs/common';
import { JobsModule } from '../jobs/jobs.module';
import { PipelinesModule } from '../pipelines/pipelines.module';
import { PricePipelinesService } from './price-pipelines.service';
import { QuotesApiClient } from './quotes-api.client';

@Module({
  imports: [JobsModule, PipelinesModule],
  providers: [QuotesApiClient, PricePipelinesService],
  exports: [PricePipelinesService],
})
export class PricesModule {}
