import { Module } from '@nestjs/common';
import { ApplicationModule } from '../application/application.module';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { JobSchedulerService } from './job-scheduler.service';

/**
 * Processing Module
 * Driving side of the worker: pulls leases off the jobs queue and feeds them
 * to the process-job use case
 */
@Module({
  imports: [ApplicationModule, InfrastructureModule],
  providers: [JobSchedulerService],
  exports: [JobSchedulerService],
})
export class ProcessingModule {}
