import { HttpBusinessException } from '@/common/exceptions/http-business.exception';
import { ErrorCodeEnum } from '@/shared/constants/error-code.constant';
import { LoggerService } from '@/shared/services/logger.service';
import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Query,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { CheckPaymentQueryDto, CreateInvoiceDto, RefundOrderDto, SubmitPaymentDto } from '../../dto';
import { CaptureContext, CheckoutService, CheckoutStatus } from '../../services/checkout.service';

@ApiTags('qpay')
@Controller('payment/qpay')
export class QPayCheckoutController {
  constructor(
    private readonly checkoutService: CheckoutService,
    private readonly logger: LoggerService,
  ) {
    logger.setContext(QPayCheckoutController.name);
  }

  @Post('create')
  @HttpCode(HttpStatus.CREATED)
  async create(@Body() dto: CreateInvoiceDto): Promise<CaptureContext> {
    return this.checkoutService.createCaptureContext(dto.basket_id);
  }

  /**
   * The payer lands here after the gateway redirect; the frontend forwards
   * the invoice id it was given.
   */
  @Get('check')
  @HttpCode(HttpStatus.CREATED)
  async check(@Query() query: CheckPaymentQueryDto): Promise<{ receipt_page_url: string }> {
    const invoiceId = query.qpay_payment_id;
    const basket = await this.checkoutService.findBasketByInvoice(invoiceId);
    if (!basket) {
      this.logger.info(
        `Received QPay payment notification for non-existent basket with payment intent id [${invoiceId}].`,
      );
      throw new BadRequestException({});
    }

    this.logger.info(
      `check called for QPay payment intent id [${invoiceId}], basket [${basket.id}] with status [${basket.status}], and order number [${basket.orderNumber}].`,
    );

    const outcome = await this.checkoutService.completeCheckout(invoiceId, basket);
    switch (outcome.status) {
      case CheckoutStatus.PLACED:
        return { receipt_page_url: this.checkoutService.buildReceiptUrl(basket.orderNumber) };
      case CheckoutStatus.PAYMENT_REJECTED:
      case CheckoutStatus.PAYMENT_FAILED:
        throw new HttpBusinessException(
          ErrorCodeEnum.OrderNotPaid,
          this.checkoutService.notPaidMessage,
        );
      case CheckoutStatus.DUPLICATE_SETTLEMENT:
        throw new HttpBusinessException(ErrorCodeEnum.DuplicateSettlement);
      case CheckoutStatus.ORDER_FAILED:
        throw new BadRequestException({});
    }
  }

  @Post('submit')
  @HttpCode(HttpStatus.CREATED)
  async submit(@Body() dto: SubmitPaymentDto): Promise<{ url: string }> {
    const basket = await this.checkoutService.findBasketById(dto.basket_id);
    await this.checkoutService.attachInvoice(basket, dto.payment_intent_id);

    const outcome = await this.checkoutService.completeCheckout(dto.payment_intent_id, basket);
    switch (outcome.status) {
      case CheckoutStatus.PLACED:
        return { url: this.checkoutService.buildReceiptUrl(basket.orderNumber) };
      case CheckoutStatus.PAYMENT_REJECTED:
      case CheckoutStatus.PAYMENT_FAILED:
        throw new BadRequestException({ error: this.checkoutService.notPaidMessage });
      case CheckoutStatus.DUPLICATE_SETTLEMENT:
      case CheckoutStatus.ORDER_FAILED:
        throw new BadRequestException({});
    }
  }

  @Post('refund')
  @HttpCode(HttpStatus.CREATED)
  async refund(@Body() dto: RefundOrderDto): Promise<{ transaction_id: string }> {
    const transactionId = await this.checkoutService.refundOrder(dto.order_number);
    return { transaction_id: transactionId };
  }
}
