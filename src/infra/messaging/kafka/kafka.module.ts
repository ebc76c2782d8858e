import { AppConfigService } from '@/shared/services/config.service';
import { LoggerService } from '@/shared/services/logger.service';
import { DynamicModule, Global, Module } from '@nestjs/common';
import { Kafka, Producer } from 'kafkajs';
import { KafkaProducerService } from './kafka-producer.service';
import { KAFKA, KAFKA_PRODUCER } from './kafka.tokens';

const CONNECT_RETRY_DELAY_MS = 750;

const connectWithDeadline = async (
  producer: Producer,
  deadlineMs: number,
  logger: LoggerService,
): Promise<void> => {
  const deadline = Date.now() + deadlineMs;
  for (let attempt = 1; ; attempt++) {
    try {
      await producer.connect();
      logger.info(`Kafka producer connected after ${attempt} attempt(s)`);
      return;
    } catch (error) {
      if (Date.now() > deadline) throw error;
      logger.warn(`Kafka producer connect attempt ${attempt} failed, retrying`);
      await new Promise((resolve) => setTimeout(resolve, CONNECT_RETRY_DELAY_MS));
    }
  }
};

@Global()
@Module({})
export class KafkaModule {
  static forRootAsync(): DynamicModule {
    return {
      module: KafkaModule,
      providers: [
        {
          provide: KAFKA,
          inject: [AppConfigService],
          useFactory: (cfg: AppConfigService) => new Kafka(cfg.getKafkaClientConfig()),
        },
        {
          provide: KAFKA_PRODUCER,
          inject: [KAFKA, AppConfigService, LoggerService],
          useFactory: async (
            kafka: Kafka,
            cfg: AppConfigService,
            logger: LoggerService,
          ): Promise<Producer> => {
            logger.setContext(KafkaModule.name);
            const producer = kafka.producer(cfg.getKafkaProducerConfig());
            // the broker may still be starting alongside the service
            await connectWithDeadline(
              producer,
              cfg.getNumber('KAFKA_CONNECT_DEADLINE_MS') || 30_000,
              logger,
            );
            return producer;
          },
        },
        KafkaProducerService,
      ],
      exports: [KafkaProducerService],
      global: true,
    };
  }
}
