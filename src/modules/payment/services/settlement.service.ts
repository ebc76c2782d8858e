import { GatewayInvariantViolationError } from '@/common/exceptions/gateway.exception';
import { LoggerService } from '@/shared/services/logger.service';
import { JsonObject } from '@/shared/utils/json.util';
import { Injectable } from '@nestjs/common';
import { PaymentProvider } from '../enums/provider.enum';
import { PaymentGatewayFactory } from '../gateways/gateway.factory';
import { SettlementStatus } from '../gateways/gateway.interface';
import { AuditService } from './audit.service';

/** The pending order an invoice is meant to pay for. */
export interface OrderContext {
  basketId: string;
  orderNumber: string;
  /** Decimal amount in major units. */
  amount: string;
  currency: string;
  provider: PaymentProvider;
}

export interface PaymentRecord {
  transactionId: string;
  amount: string;
  currency: string;
  cardLabel: string;
  rawResponse: JsonObject;
}

export type SettlementResult =
  | { outcome: 'settled'; record: PaymentRecord }
  | { outcome: 'rejected'; reason: 'ORDER_NOT_PAID'; rawResponse: JsonObject };

@Injectable()
export class SettlementService {
  private readonly PAID_STATUS = 'PAID';

  constructor(
    private readonly gatewayFactory: PaymentGatewayFactory,
    private readonly audit: AuditService,
    private readonly logger: LoggerService,
  ) {
    logger.setContext(SettlementService.name);
  }

  /**
   * Polls the gateway once and turns the answer into a settlement outcome.
   * The observed response is audited exactly once on every path that got
   * one, before the outcome is returned or thrown. Holds no lock: callers
   * that need at-most-once settlement rely on the unique payment source.
   */
  async confirm(invoiceId: string, context: OrderContext): Promise<SettlementResult> {
    const gateway = this.gatewayFactory.getGateway(context.provider);

    const status = await gateway.checkStatus(invoiceId);
    await this.audit.record(gateway.name, status.raw, invoiceId, context.basketId);

    if (status.status === SettlementStatus.NOT_PAID) {
      this.logger.warn(
        `${gateway.name} NOT PAID for basket [${context.basketId}]: ${invoiceId}`,
      );
      return { outcome: 'rejected', reason: 'ORDER_NOT_PAID', rawResponse: status.raw };
    }

    const { row } = status;
    if (row.paymentStatus !== this.PAID_STATUS || !row.paymentId) {
      this.logger.error(
        `${gateway.name} reported invoice ${invoiceId} as paid but the payment row disagrees`,
        JSON.stringify(row.raw),
      );
      throw new GatewayInvariantViolationError(
        `Paid response for invoice ${invoiceId} is inconsistent`,
        gateway.name,
        row.raw,
      );
    }

    this.logger.info(
      `Successfully confirmed ${gateway.name} invoice [${invoiceId}] for basket [${context.basketId}] and order number [${context.orderNumber}].`,
    );

    return {
      outcome: 'settled',
      record: {
        transactionId: invoiceId,
        amount: context.amount,
        currency: context.currency,
        cardLabel: gateway.cardLabel,
        rawResponse: row.raw,
      },
    };
  }
}
