import { HttpBusinessException } from '@/common/exceptions/http-business.exception';
import { ErrorCodeEnum } from '@/shared/constants/error-code.constant';
import { LoggerService } from '@/shared/services/logger.service';
import { createBasket, createMockLogger } from '@/__tests__/utils/mock-helpers';
import { BadRequestException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { CheckoutService, CheckoutStatus } from '../../../services/checkout.service';
import { QPayCheckoutController } from '../qpay-checkout.controller';

describe('QPayCheckoutController', () => {
  let controller: QPayCheckoutController;
  const basket = createBasket();
  const receiptUrl = 'https://shop.test/checkout/receipt/?order_number=ORD-1&disable_back_button=1';

  const checkoutService = {
    notPaidMessage: 'Payment has not been completed',
    createCaptureContext: jest.fn(),
    findBasketById: jest.fn(),
    findBasketByInvoice: jest.fn(),
    attachInvoice: jest.fn(),
    completeCheckout: jest.fn(),
    refundOrder: jest.fn(),
    buildReceiptUrl: jest.fn(() => receiptUrl),
  };

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      controllers: [QPayCheckoutController],
      providers: [
        { provide: CheckoutService, useValue: checkoutService },
        { provide: LoggerService, useValue: createMockLogger() },
      ],
    }).compile();

    controller = moduleRef.get(QPayCheckoutController);
  });

  describe('create', () => {
    it('should return the capture context', async () => {
      const context = { invoice_id: 'INV-1', qpay_link: 'link', qpay_qr: 'qr', order_id: 'ORD-1' };
      checkoutService.createCaptureContext.mockResolvedValue(context);

      await expect(controller.create({ basket_id: basket.id })).resolves.toEqual(context);
      expect(checkoutService.createCaptureContext).toHaveBeenCalledWith(basket.id);
    });
  });

  describe('check', () => {
    it('should answer with an empty 400 for an unknown invoice', async () => {
      checkoutService.findBasketByInvoice.mockResolvedValue(null);

      const error = await controller.check({ qpay_payment_id: 'INV-X' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BadRequestException);
      expect(error).toMatchObject({ response: {} });
      expect(checkoutService.completeCheckout).not.toHaveBeenCalled();
    });

    it('should return the receipt page once the order is placed', async () => {
      checkoutService.findBasketByInvoice.mockResolvedValue(basket);
      checkoutService.completeCheckout.mockResolvedValue({ status: CheckoutStatus.PLACED });

      await expect(controller.check({ qpay_payment_id: 'INV-1' })).resolves.toEqual({
        receipt_page_url: receiptUrl,
      });
      expect(checkoutService.completeCheckout).toHaveBeenCalledWith('INV-1', basket);
      expect(checkoutService.buildReceiptUrl).toHaveBeenCalledWith('ORD-1');
    });

    it.each([CheckoutStatus.PAYMENT_REJECTED, CheckoutStatus.PAYMENT_FAILED])(
      'should report %s as an unpaid order',
      async (status) => {
        checkoutService.findBasketByInvoice.mockResolvedValue(basket);
        checkoutService.completeCheckout.mockResolvedValue({ status });

        const error = await controller.check({ qpay_payment_id: 'INV-1' }).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(HttpBusinessException);
        expect(error).toMatchObject({
          errorCode: ErrorCodeEnum.OrderNotPaid,
          response: { error_code: 30400, user_message: 'Payment has not been completed' },
        });
      },
    );

    it('should report an invoice that was already settled', async () => {
      checkoutService.findBasketByInvoice.mockResolvedValue(basket);
      checkoutService.completeCheckout.mockResolvedValue({ status: CheckoutStatus.DUPLICATE_SETTLEMENT });

      await expect(controller.check({ qpay_payment_id: 'INV-1' })).rejects.toMatchObject({
        errorCode: ErrorCodeEnum.DuplicateSettlement,
      });
    });

    it('should answer with an empty 400 when the order cannot be placed', async () => {
      checkoutService.findBasketByInvoice.mockResolvedValue(basket);
      checkoutService.completeCheckout.mockResolvedValue({ status: CheckoutStatus.ORDER_FAILED });

      await expect(controller.check({ qpay_payment_id: 'INV-1' })).rejects.toBeInstanceOf(
        BadRequestException,
      );
    });
  });

  describe('submit', () => {
    const dto = { basket_id: basket.id, payment_intent_id: 'INV-1' };

    it('should attach the invoice and return the receipt url', async () => {
      checkoutService.findBasketById.mockResolvedValue(basket);
      checkoutService.completeCheckout.mockResolvedValue({ status: CheckoutStatus.PLACED });

      await expect(controller.submit(dto)).resolves.toEqual({ url: receiptUrl });
      expect(checkoutService.attachInvoice).toHaveBeenCalledWith(basket, 'INV-1');
      expect(checkoutService.completeCheckout).toHaveBeenCalledWith('INV-1', basket);
    });

    it('should return the not-paid message when payment fails', async () => {
      checkoutService.findBasketById.mockResolvedValue(basket);
      checkoutService.completeCheckout.mockResolvedValue({ status: CheckoutStatus.PAYMENT_REJECTED });

      await expect(controller.submit(dto)).rejects.toMatchObject({
        response: { error: 'Payment has not been completed' },
      });
    });

    it('should answer with an empty 400 when the order cannot be placed', async () => {
      checkoutService.findBasketById.mockResolvedValue(basket);
      checkoutService.completeCheckout.mockResolvedValue({ status: CheckoutStatus.ORDER_FAILED });

      await expect(controller.submit(dto)).rejects.toMatchObject({ response: {}, status: 400 });
    });
  });

  describe('refund', () => {
    it('should return the refunded transaction id', async () => {
      checkoutService.refundOrder.mockResolvedValue('INV-1');

      await expect(controller.refund({ order_number: 'ORD-1' })).resolves.toEqual({
        transaction_id: 'INV-1',
      });
    });
  });
});
