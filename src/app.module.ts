import { Module, NestModule, MiddlewareConsumer, Logger } from '@nestjs/common';
import { AppController } from './app.controller';
import { AuthMiddleware } from './auth.middleware';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { CleanupService } from './cleanup/cleanup.service';
import { validateEnv } from './config/pipeline.config';
import { BridgeClient } from './bridge/bridge.client';
import { BridgeDeliveryGateway } from './bridge/bridge-delivery.gateway';
import { BridgePlanPolicy } from './bridge/bridge-plan.policy';
import { BridgeProcessingGateway } from './bridge/bridge-processing.gateway';
import { CompletionPollerService } from './pipeline/completion-poller.service';
import { ConcurrencyLedgerService } from './pipeline/concurrency-ledger.service';
import {
  DELIVERY_GATEWAY,
  PLAN_POLICY,
  PROCESSING_GATEWAY,
} from './pipeline/interfaces/gateways.interface';
import { JobRegistryService } from './pipeline/job-registry.service';
import { LifecycleCoordinatorService } from './pipeline/lifecycle-coordinator.service';
import { QueueStoreService } from './pipeline/queue-store.service';

@Module({
  imports: [
    ScheduleModule.forRoot(),
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
  ],
  controllers: [AppController],
  providers: [
    Logger,
    BridgeClient,
    { provide: PROCESSING_GATEWAY, useClass: BridgeProcessingGateway },
    { provide: DELIVERY_GATEWAY, useClass: BridgeDeliveryGateway },
    { provide: PLAN_POLICY, useClass: BridgePlanPolicy },
    ConcurrencyLedgerService,
    QueueStoreService,
    JobRegistryService,
    LifecycleCoordinatorService,
    CompletionPollerService,
    CleanupService,
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer
      .apply(AuthMiddleware)
      .forRoutes(AppController);
  }
}
