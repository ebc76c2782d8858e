import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { GlobalHttpExceptionFilter } from './common/filters/global-http-exception.filter';
import { LoggerMiddleware } from './common/middlewares/logging.middleware';
import { DatabaseModule } from './infra/database/typeorm/database.module';
import { KafkaModule } from './infra/messaging/kafka/kafka.module';
import { CheckoutModule } from './modules/checkout/checkout.module';
import { PaymentModule } from './modules/payment/payment.module';
import { SharedModule } from './shared.module';

@Module({
  imports: [
    SharedModule,
    DatabaseModule,
    KafkaModule.forRootAsync(),
    PaymentModule,
    CheckoutModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: GlobalHttpExceptionFilter,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(LoggerMiddleware).forRoutes('*');
  }
}
