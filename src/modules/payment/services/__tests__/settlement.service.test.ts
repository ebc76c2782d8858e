import { GatewayInvariantViolationError } from '@/common/exceptions/gateway.exception';
import { LoggerService } from '@/shared/services/logger.service';
import {
  createAxiosResponse,
  createMockAuditService,
  createMockGateway,
  createMockLogger,
  TEST_QPAY_CONFIG,
} from '@/__tests__/utils/mock-helpers';
import { HttpService } from '@nestjs/axios';
import { Test } from '@nestjs/testing';
import axios from 'axios';
import { PaymentProvider } from '../../enums/provider.enum';
import { PaymentGatewayFactory } from '../../gateways/gateway.factory';
import { SettlementStatus } from '../../gateways/gateway.interface';
import { QPayGateway } from '../../gateways/qpay/qpay.gateway';
import { AuditService } from '../audit.service';
import { OrderContext, SettlementService } from '../settlement.service';

describe('SettlementService', () => {
  let service: SettlementService;
  const gateway = createMockGateway();
  const audit = createMockAuditService();
  const logger = createMockLogger();

  const context: OrderContext = {
    basketId: 'basket-1',
    orderNumber: 'ORD-1',
    amount: '49.99',
    currency: 'USD',
    provider: PaymentProvider.QPAY,
  };

  beforeEach(async () => {
    audit.record.mockResolvedValue(undefined);

    const moduleRef = await Test.createTestingModule({
      providers: [
        SettlementService,
        { provide: PaymentGatewayFactory, useValue: { getGateway: jest.fn(() => gateway) } },
        { provide: AuditService, useValue: audit },
        { provide: LoggerService, useValue: logger },
      ],
    }).compile();

    service = moduleRef.get(SettlementService);
  });

  describe('confirm', () => {
    it('should settle when the gateway reports a PAID row', async () => {
      const row = { payment_id: 'PAY-1', payment_status: 'PAID' };
      const raw = { count: 1, rows: [row] };
      gateway.checkStatus.mockResolvedValue({
        status: SettlementStatus.PAID,
        row: { paymentId: 'PAY-1', paymentStatus: 'PAID', raw: row },
        raw,
      });

      const result = await service.confirm('INV-1', context);

      expect(result).toEqual({
        outcome: 'settled',
        record: {
          transactionId: 'INV-1',
          amount: '49.99',
          currency: 'USD',
          cardLabel: 'QPay',
          rawResponse: row,
        },
      });
      expect(gateway.checkStatus).toHaveBeenCalledTimes(1);
      expect(gateway.checkStatus).toHaveBeenCalledWith('INV-1');
      expect(audit.record).toHaveBeenCalledTimes(1);
      expect(audit.record).toHaveBeenCalledWith('qpay', raw, 'INV-1', 'basket-1');
    });

    it('should reject and audit once when the invoice is not found', async () => {
      const raw = { error: 'PAYMENT_NOTFOUND' };
      gateway.checkStatus.mockResolvedValue({ status: SettlementStatus.NOT_PAID, raw });

      const result = await service.confirm('INV-1', context);

      expect(result).toEqual({ outcome: 'rejected', reason: 'ORDER_NOT_PAID', rawResponse: raw });
      expect(audit.record).toHaveBeenCalledTimes(1);
      expect(audit.record).toHaveBeenCalledWith('qpay', raw, 'INV-1', 'basket-1');
    });

    it('should reject when no row is PAID', async () => {
      const raw = { count: 1, rows: [{ payment_status: 'FAILED' }] };
      gateway.checkStatus.mockResolvedValue({ status: SettlementStatus.NOT_PAID, raw });

      const result = await service.confirm('INV-1', context);

      expect(result.outcome).toBe('rejected');
      expect(logger.warn).toHaveBeenCalledWith('qpay NOT PAID for basket [basket-1]: INV-1');
    });

    it('should raise GatewayInvariantViolationError for a paid row without payment id', async () => {
      const row = { payment_status: 'PAID' };
      gateway.checkStatus.mockResolvedValue({
        status: SettlementStatus.PAID,
        row: { paymentStatus: 'PAID', raw: row },
        raw: { rows: [row] },
      });

      await expect(service.confirm('INV-1', context)).rejects.toBeInstanceOf(
        GatewayInvariantViolationError,
      );
      expect(audit.record).toHaveBeenCalledTimes(1);
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it('should propagate gateway failures without auditing', async () => {
      const failure = new Error('socket hang up');
      gateway.checkStatus.mockRejectedValue(failure);

      await expect(service.confirm('INV-1', context)).rejects.toBe(failure);
      expect(audit.record).not.toHaveBeenCalled();
    });
  });

  describe('confirm against the QPay gateway', () => {
    const axiosRef = axios.create();
    const post = jest.spyOn(axiosRef, 'post');
    const qpay = new QPayGateway(new HttpService(axiosRef), TEST_QPAY_CONFIG);
    const tokenResponse = createAxiosResponse({ access_token: 'test-token' });
    let qpaySettlement: SettlementService;

    beforeEach(async () => {
      post.mockReset();

      const moduleRef = await Test.createTestingModule({
        providers: [
          SettlementService,
          { provide: PaymentGatewayFactory, useValue: new PaymentGatewayFactory(qpay) },
          { provide: AuditService, useValue: audit },
          { provide: LoggerService, useValue: logger },
        ],
      }).compile();

      qpaySettlement = moduleRef.get(SettlementService);
    });

    it('should settle a PAID invoice and audit the page it came from', async () => {
      const page = { count: 1, rows: [{ payment_id: 501, payment_status: 'PAID' }] };
      post.mockResolvedValueOnce(tokenResponse).mockResolvedValueOnce(createAxiosResponse(page));

      const result = await qpaySettlement.confirm('INV-1', context);

      expect(result).toEqual({
        outcome: 'settled',
        record: {
          transactionId: 'INV-1',
          amount: '49.99',
          currency: 'USD',
          cardLabel: 'QPay',
          rawResponse: { payment_id: 501, payment_status: 'PAID' },
        },
      });
      expect(audit.record).toHaveBeenCalledTimes(1);
      expect(audit.record).toHaveBeenCalledWith('qpay', page, 'INV-1', 'basket-1');
    });

    it('should reject an unknown invoice and audit the gateway answer once', async () => {
      post
        .mockResolvedValueOnce(tokenResponse)
        .mockResolvedValueOnce(createAxiosResponse({ error: 'PAYMENT_NOTFOUND' }));

      const result = await qpaySettlement.confirm('INV-1', context);

      expect(result).toEqual({
        outcome: 'rejected',
        reason: 'ORDER_NOT_PAID',
        rawResponse: { error: 'PAYMENT_NOTFOUND' },
      });
      expect(post).toHaveBeenCalledTimes(2);
      expect(audit.record).toHaveBeenCalledTimes(1);
      expect(audit.record).toHaveBeenCalledWith(
        'qpay',
        { error: 'PAYMENT_NOTFOUND' },
        'INV-1',
        'basket-1',
      );
    });
  });
});
