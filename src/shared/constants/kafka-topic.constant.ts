export const KAFKA_TOPICS = {
  PAYMENT_PROCESSOR_RESPONSE: 'payment.processor-response',
} as const;

export type KafkaTopicType = (typeof KAFKA_TOPICS)[keyof typeof KAFKA_TOPICS];
