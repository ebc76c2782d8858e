import { AppConfigService } from '@/shared/services/config.service';
import { HttpModule } from '@nestjs/axios';
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PaymentProcessorResponseEntity, PaymentSourceEntity } from './entities';
import { PaymentGatewayFactory } from './gateways/gateway.factory';
import { QPAY_CLIENT_CONFIG } from './gateways/qpay/qpay.config';
import { QPayGateway } from './gateways/qpay/qpay.gateway';
import { PaymentProcessorResponseRepository } from './repository/payment-processor-response.repository';
import { PaymentSourceRepository } from './repository/payment-source.repository';
import { AuditService } from './services/audit.service';
import { PaymentEventService } from './services/event.service';
import { RefundService } from './services/refund.service';
import { SettlementService } from './services/settlement.service';

@Module({
  imports: [
    HttpModule,
    TypeOrmModule.forFeature([PaymentProcessorResponseEntity, PaymentSourceEntity]),
  ],
  providers: [
    {
      provide: QPAY_CLIENT_CONFIG,
      inject: [AppConfigService],
      useFactory: (cfg: AppConfigService) => cfg.qpayConfig,
    },
    QPayGateway,
    PaymentGatewayFactory,
    PaymentProcessorResponseRepository,
    PaymentSourceRepository,
    AuditService,
    SettlementService,
    RefundService,
    PaymentEventService,
  ],
  exports: [
    PaymentGatewayFactory,
    PaymentSourceRepository,
    AuditService,
    SettlementService,
    RefundService,
    PaymentEventService,
  ],
})
export class PaymentModule {}
