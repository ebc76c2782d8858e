import { KafkaTopicType } from '@/shared/constants/kafka-topic.constant';
import { LoggerService } from '@/shared/services/logger.service';
import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { IHeaders, Producer } from 'kafkajs';
import { v4 as uuidv4 } from 'uuid';
import { IKafkaMetadata } from './interfaces/message.interface';
import { KAFKA_PRODUCER } from './kafka.tokens';

export interface PublishResult {
  topic: string;
  partition: number;
  offset: string;
}

@Injectable()
export class KafkaProducerService implements OnModuleDestroy {
  constructor(
    @Inject(KAFKA_PRODUCER) private readonly producer: Producer,
    private readonly logger: LoggerService,
  ) {
    logger.setContext(KafkaProducerService.name);
  }

  private buildHeaders(metadata: IKafkaMetadata): IHeaders {
    return {
      messageId: uuidv4(),
      timestamp: metadata.timestamp,
      source: metadata.source,
      eventType: metadata.eventType,
      eventVersion: metadata.eventVersion,
      ...(metadata.correlationId ? { correlationId: metadata.correlationId } : {}),
    };
  }

  async publish<T>(
    topic: KafkaTopicType,
    value: T,
    key: string | undefined,
    metadata: IKafkaMetadata,
  ): Promise<PublishResult> {
    const [res] = await this.producer.send({
      topic,
      acks: -1, // all in-sync replicas
      timeout: 30_000,
      messages: [
        { key, value: Buffer.from(JSON.stringify(value)), headers: this.buildHeaders(metadata) },
      ],
    });
    this.logger.debug(`Message sent to topic: ${topic}`);
    return { topic: res.topicName, partition: res.partition, offset: res.baseOffset ?? '-1' };
  }

  async onModuleDestroy() {
    try {
      await this.producer.disconnect();
    } catch (error) {
      this.logger.warn(`Error disconnecting Kafka producer: ${String(error)}`);
    }
  }
}
