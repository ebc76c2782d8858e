export interface IKafkaMetadata {
  correlationId?: string;
  eventType: string;
  eventVersion: string;
  timestamp: string;
  source: string;
}
