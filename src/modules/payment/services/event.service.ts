import { KafkaProducerService } from '@/infra/messaging/kafka/kafka-producer.service';
import { KAFKA_TOPICS } from '@/shared/constants/kafka-topic.constant';
import { LoggerService } from '@/shared/services/logger.service';
import { Injectable } from '@nestjs/common';
import { PaymentEventType, PaymentProcessorResponseEvent } from '../events/payment-events';

@Injectable()
export class PaymentEventService {
  constructor(
    private readonly producer: KafkaProducerService,
    private readonly logger: LoggerService,
  ) {
    logger.setContext(PaymentEventService.name);
  }

  /**
   * Publish payment processor response event
   */
  async publishProcessorResponse(event: PaymentProcessorResponseEvent): Promise<void> {
    try {
      await this.producer.publish(KAFKA_TOPICS.PAYMENT_PROCESSOR_RESPONSE, event, event.basket_id, {
        eventType: PaymentEventType.PAYMENT_PROCESSOR_RESPONSE,
        eventVersion: '1.0',
        source: 'qpay-checkout',
        timestamp: new Date().toISOString(),
        correlationId: event.order_number,
      });

      this.logger.log(`Payment processor response event published: basket ${event.basket_id}`);
    } catch (error) {
      this.logger.error('Failed to publish payment processor response event', error);
      throw error;
    }
  }
}
