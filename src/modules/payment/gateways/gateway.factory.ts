import { Injectable } from '@nestjs/common';
import { PaymentProvider } from '../enums/provider.enum';
import { PaymentGatewayInterface } from './gateway.interface';
import { QPayGateway } from './qpay/qpay.gateway';

@Injectable()
export class PaymentGatewayFactory {
  constructor(private readonly qpayGateway: QPayGateway) {}

  getGateway(provider: PaymentProvider): PaymentGatewayInterface {
    switch (provider) {
      case PaymentProvider.QPAY:
        return this.qpayGateway;

      default:
        throw new Error(`Unsupported provider: ${String(provider)}`);
    }
  }
}
