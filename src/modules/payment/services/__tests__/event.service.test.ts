import { KafkaProducerService } from '@/infra/messaging/kafka/kafka-producer.service';
import { KAFKA_TOPICS } from '@/shared/constants/kafka-topic.constant';
import { LoggerService } from '@/shared/services/logger.service';
import { createMockLogger } from '@/__tests__/utils/mock-helpers';
import { Test } from '@nestjs/testing';
import { PaymentEventType } from '../../events/payment-events';
import { PaymentEventService } from '../event.service';

describe('PaymentEventService', () => {
  let service: PaymentEventService;
  const producer = { publish: jest.fn() };
  const logger = createMockLogger();

  const event = {
    basket_id: 'basket-1',
    order_number: 'ORD-1',
    processor_name: 'qpay',
    success: true,
    total: '49.99',
    currency: 'USD',
  };

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        PaymentEventService,
        { provide: KafkaProducerService, useValue: producer },
        { provide: LoggerService, useValue: logger },
      ],
    }).compile();

    service = moduleRef.get(PaymentEventService);
  });

  it('should publish keyed by basket with event metadata', async () => {
    producer.publish.mockResolvedValue({ topic: KAFKA_TOPICS.PAYMENT_PROCESSOR_RESPONSE, partition: 0, offset: '1' });

    await service.publishProcessorResponse(event);

    expect(producer.publish).toHaveBeenCalledWith(
      'payment.processor-response',
      event,
      'basket-1',
      expect.objectContaining({
        eventType: PaymentEventType.PAYMENT_PROCESSOR_RESPONSE,
        eventVersion: '1.0',
        source: 'qpay-checkout',
        correlationId: 'ORD-1',
      }),
    );
  });

  it('should log and rethrow publish failures', async () => {
    const failure = new Error('broker unavailable');
    producer.publish.mockRejectedValue(failure);

    await expect(service.publishProcessorResponse(event)).rejects.toBe(failure);
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to publish payment processor response event',
      failure,
    );
  });
});
