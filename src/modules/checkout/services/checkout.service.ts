import { HttpBusinessException } from '@/common/exceptions/http-business.exception';
import { isGatewayError } from '@/common/exceptions/gateway.exception';
import { PaymentProvider } from '@/modules/payment/enums/provider.enum';
import { PaymentGatewayFactory } from '@/modules/payment/gateways/gateway.factory';
import {
  DuplicatePaymentSourceError,
  PaymentSourceRepository,
} from '@/modules/payment/repository/payment-source.repository';
import { AuditService } from '@/modules/payment/services/audit.service';
import { PaymentEventService } from '@/modules/payment/services/event.service';
import { RefundService } from '@/modules/payment/services/refund.service';
import {
  OrderContext,
  PaymentRecord,
  SettlementService,
} from '@/modules/payment/services/settlement.service';
import { ErrorCodeEnum } from '@/shared/constants/error-code.constant';
import { AppConfigService } from '@/shared/services/config.service';
import { LoggerService } from '@/shared/services/logger.service';
import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import {
  BasketEntity,
  BasketStatus,
  OrderEntity,
  OrderStatus,
  PAYMENT_INTENT_ID_ATTRIBUTE,
} from '../entities';
import { BasketRepository } from '../repository/basket.repository';
import { OrderRepository } from '../repository/order.repository';

export interface CaptureContext {
  invoice_id: string;
  qpay_link: string;
  qpay_qr: string;
  order_id: string;
}

export enum CheckoutStatus {
  PLACED = 'PLACED',
  PAYMENT_REJECTED = 'PAYMENT_REJECTED',
  PAYMENT_FAILED = 'PAYMENT_FAILED',
  DUPLICATE_SETTLEMENT = 'DUPLICATE_SETTLEMENT',
  ORDER_FAILED = 'ORDER_FAILED',
}

export type CheckoutOutcome =
  | { status: CheckoutStatus.PLACED; order: OrderEntity; record: PaymentRecord }
  | { status: CheckoutStatus.PAYMENT_REJECTED }
  | { status: CheckoutStatus.PAYMENT_FAILED; error: unknown }
  | { status: CheckoutStatus.DUPLICATE_SETTLEMENT }
  | { status: CheckoutStatus.ORDER_FAILED; error: unknown };

const errorName = (error: unknown): string =>
  error instanceof Error ? error.name : typeof error;

@Injectable()
export class CheckoutService {
  constructor(
    private readonly baskets: BasketRepository,
    private readonly orders: OrderRepository,
    private readonly paymentSources: PaymentSourceRepository,
    private readonly gatewayFactory: PaymentGatewayFactory,
    private readonly settlement: SettlementService,
    private readonly refunds: RefundService,
    private readonly audit: AuditService,
    private readonly events: PaymentEventService,
    private readonly dataSource: DataSource,
    private readonly configService: AppConfigService,
    private readonly logger: LoggerService,
  ) {
    logger.setContext(CheckoutService.name);
  }

  private toOrderContext(basket: BasketEntity, provider: PaymentProvider): OrderContext {
    return {
      basketId: basket.id,
      orderNumber: basket.orderNumber,
      amount: basket.totalInclTax,
      currency: basket.currency,
      provider,
    };
  }

  private async trackProcessorResponse(
    basket: BasketEntity,
    provider: PaymentProvider,
    result: { success: true; total: string; currency: string } | { success: false; paymentError: string },
  ): Promise<void> {
    try {
      await this.events.publishProcessorResponse({
        basket_id: basket.id,
        order_number: basket.orderNumber,
        processor_name: provider,
        ...(result.success
          ? { success: true, total: result.total, currency: result.currency }
          : { success: false, payment_error: result.paymentError }),
      });
    } catch (error) {
      this.logger.warn(
        `Payment processor response event dropped for basket [${basket.id}]: ${String(error)}`,
      );
    }
  }

  buildReceiptUrl(orderNumber: string): string {
    const url = new URL(this.configService.checkoutConfig.receiptPageUrl);
    url.searchParams.set('order_number', orderNumber);
    url.searchParams.set('disable_back_button', '1');
    return url.toString();
  }

  get notPaidMessage(): string {
    return this.configService.checkoutConfig.notPaidMessage;
  }

  async findBasketById(basketId: string): Promise<BasketEntity> {
    const basket = await this.baskets.findById(basketId);
    if (!basket) throw new HttpBusinessException(ErrorCodeEnum.BasketNotFound);
    return basket;
  }

  /**
   * Create a gateway invoice for the basket and remember its id on the basket
   * so the callback can find it again.
   */
  async createCaptureContext(
    basketId: string,
    provider: PaymentProvider = PaymentProvider.QPAY,
  ): Promise<CaptureContext> {
    const basket = await this.findBasketById(basketId);

    if (basket.lineCount === 0) {
      this.logger.info(
        `${provider} capture-context called with empty basket [${basket.id}] and order number [${basket.orderNumber}].`,
      );
      return { invoice_id: '', qpay_link: '', qpay_qr: '', order_id: basket.orderNumber };
    }

    const gateway = this.gatewayFactory.getGateway(provider);
    try {
      const invoice = await gateway.createInvoice({
        orderReference: basket.orderNumber,
        amount: basket.totalInclTax,
        currency: basket.currency,
        callbackUrl: gateway.buildCallbackUrl(basket.orderNumber),
      });
      await this.audit.record(gateway.name, invoice.raw, invoice.invoiceId, basket.id);
      await this.baskets.setAttribute(basket.id, PAYMENT_INTENT_ID_ATTRIBUTE, invoice.invoiceId);

      this.logger.info(
        `Created ${provider} invoice [${invoice.invoiceId}] for basket [${basket.id}].`,
      );
      return {
        invoice_id: invoice.invoiceId,
        qpay_link: invoice.shortLink,
        qpay_qr: invoice.qrImageRef,
        order_id: basket.orderNumber,
      };
    } catch (error) {
      if (!isGatewayError(error)) throw error;
      this.logger.error(`Failed to create ${provider} invoice for basket [${basket.id}]`, error);
      throw new HttpBusinessException(ErrorCodeEnum.InvoiceCreationFailed);
    }
  }

  /**
   * Resolve the basket an invoice was created for. Returns null when no
   * basket, or more than one, carries the invoice.
   */
  async findBasketByInvoice(invoiceId: string): Promise<BasketEntity | null> {
    const baskets = await this.baskets.findByAttribute(PAYMENT_INTENT_ID_ATTRIBUTE, invoiceId);

    if (baskets.length > 1) {
      this.logger.error(
        `Duplicate payment_intent_id [${invoiceId}] shared by baskets [${baskets.map((b) => b.id).join(', ')}].`,
      );
      return null;
    }
    if (baskets.length === 0) {
      this.logger.warn(`Could not find payment_intent_id [${invoiceId}] among baskets.`);
      return null;
    }
    return baskets[0];
  }

  async attachInvoice(basket: BasketEntity, invoiceId: string): Promise<void> {
    await this.baskets.setAttribute(basket.id, PAYMENT_INTENT_ID_ATTRIBUTE, invoiceId);
  }

  /**
   * Confirm the invoice with the gateway, then record the payment source and
   * place the order in one transaction. A concurrent settlement of the same
   * invoice loses on the unique payment source and rolls back.
   */
  async completeCheckout(
    invoiceId: string,
    basket: BasketEntity,
    provider: PaymentProvider = PaymentProvider.QPAY,
  ): Promise<CheckoutOutcome> {
    const context = this.toOrderContext(basket, provider);

    let record: PaymentRecord;
    try {
      const result = await this.settlement.confirm(invoiceId, context);
      if (result.outcome === 'rejected') {
        await this.trackProcessorResponse(basket, provider, {
          success: false,
          paymentError: 'OrderNotPaid',
        });
        return { status: CheckoutStatus.PAYMENT_REJECTED };
      }
      record = result.record;
    } catch (error) {
      await this.trackProcessorResponse(basket, provider, {
        success: false,
        paymentError: errorName(error),
      });
      this.logger.error(`Attempts to handle payment for basket [${basket.id}] failed.`, error);
      return { status: CheckoutStatus.PAYMENT_FAILED, error };
    }

    await this.trackProcessorResponse(basket, provider, {
      success: true,
      total: record.amount,
      currency: record.currency,
    });

    try {
      const order = await this.dataSource.transaction(async (manager) => {
        await this.paymentSources.create(
          {
            processorName: provider,
            transactionId: record.transactionId,
            orderNumber: basket.orderNumber,
            basketId: basket.id,
            amount: record.amount,
            currency: record.currency,
            cardLabel: record.cardLabel,
            rawResponse: record.rawResponse,
          },
          manager,
        );
        const placed = await this.orders.create(
          {
            orderNumber: basket.orderNumber,
            basketId: basket.id,
            total: record.amount,
            currency: record.currency,
          },
          manager,
        );
        await this.baskets.updateStatus(basket.id, BasketStatus.SUBMITTED, manager);
        return placed;
      });

      this.logger.info(
        `Order [${order.orderNumber}] placed for transaction [${invoiceId}] and basket [${basket.id}].`,
      );
      return { status: CheckoutStatus.PLACED, order, record };
    } catch (error) {
      if (error instanceof DuplicatePaymentSourceError) {
        this.logger.warn(`Transaction [${invoiceId}] was already settled; basket [${basket.id}].`);
        return { status: CheckoutStatus.DUPLICATE_SETTLEMENT };
      }
      this.logger.error(
        `Error processing order for transaction [${invoiceId}], with order [${basket.orderNumber}] and basket [${basket.id}]. Processed by [${provider}].`,
        error,
      );
      return { status: CheckoutStatus.ORDER_FAILED, error };
    }
  }

  async refundOrder(orderNumber: string): Promise<string> {
    const source = await this.paymentSources.findByOrderNumber(orderNumber);
    if (!source) throw new HttpBusinessException(ErrorCodeEnum.PaymentSourceNotFound);

    const order = await this.orders.findByOrderNumber(orderNumber);
    if (order?.status === OrderStatus.REFUNDED) {
      this.logger.warn(`Order [${orderNumber}] is already refunded.`);
      throw new HttpBusinessException(ErrorCodeEnum.RefundFailed);
    }

    try {
      const transactionId = await this.refunds.issueRefund(
        orderNumber,
        source.transactionId,
        source.amount,
        source.currency,
        { provider: source.processorName, basketId: source.basketId },
      );
      await this.orders.updateStatus(orderNumber, OrderStatus.REFUNDED);
      return transactionId;
    } catch (error) {
      if (!isGatewayError(error)) throw error;
      throw new HttpBusinessException(ErrorCodeEnum.RefundFailed);
    }
  }
}
