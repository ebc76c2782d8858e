import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, IsUUID } from 'class-validator';

export class CreateInvoiceDto {
  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  basket_id!: string;
}

export class CheckPaymentQueryDto {
  @ApiProperty({ description: 'Invoice id returned by the gateway' })
  @IsNotEmpty()
  @IsString()
  qpay_payment_id!: string;
}

export class SubmitPaymentDto {
  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  basket_id!: string;

  @ApiProperty({ description: 'Invoice id returned by the gateway' })
  @IsNotEmpty()
  @IsString()
  payment_intent_id!: string;
}

export class RefundOrderDto {
  @ApiProperty()
  @IsNotEmpty()
  @IsString()
  order_number!: string;
}
