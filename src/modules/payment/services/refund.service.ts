import { LoggerService } from '@/shared/services/logger.service';
import { JsonObject } from '@/shared/utils/json.util';
import { Injectable } from '@nestjs/common';
import { PaymentProvider } from '../enums/provider.enum';
import { PaymentGatewayFactory } from '../gateways/gateway.factory';
import { AuditService } from './audit.service';

export interface RefundOptions {
  provider?: PaymentProvider;
  basketId?: string | null;
}

@Injectable()
export class RefundService {
  constructor(
    private readonly gatewayFactory: PaymentGatewayFactory,
    private readonly audit: AuditService,
    private readonly logger: LoggerService,
  ) {
    logger.setContext(RefundService.name);
  }

  /**
   * Refund a captured invoice and return its transaction id.
   *
   * A failed attempt is audited with an empty body and the original error is
   * rethrown. The gateway takes no idempotency key, so callers must not retry
   * a refund whose outcome is unknown.
   */
  async issueRefund(
    orderNumber: string,
    invoiceId: string,
    amount: string,
    currency: string,
    options: RefundOptions = {},
  ): Promise<string> {
    const gateway = this.gatewayFactory.getGateway(options.provider ?? PaymentProvider.QPAY);

    let response: JsonObject;
    try {
      response = await gateway.refund(invoiceId);
    } catch (error) {
      await this.audit.record(gateway.name, {}, invoiceId, options.basketId);
      this.logger.error(
        `An error occurred while attempting to refund (via ${gateway.name}) for order [${orderNumber}].`,
        error,
      );
      throw error;
    }

    await this.audit.record(gateway.name, response, invoiceId, options.basketId);
    this.logger.info(
      `Refunded ${amount} ${currency} for order [${orderNumber}], invoice [${invoiceId}].`,
    );

    return invoiceId;
  }
}
