export enum PaymentEventType {
  PAYMENT_PROCESSOR_RESPONSE = 'PaymentProcessorResponse',
}

/**
 * Emitted after every settlement attempt, whether or not the payment went
 * through. Field names follow the analytics schema the checkout frontend
 * already consumes.
 */
export interface PaymentProcessorResponseEvent {
  basket_id: string;
  order_number: string;
  processor_name: string;
  success: boolean;
  total?: string;
  currency?: string;
  payment_error?: string;
}
