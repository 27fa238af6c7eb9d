import { Module } from '@nestjs/common';
import { CableGateway } from './cable.gateway';

@Module({
  providers: [CableGateway],
})
export class GatewayModule {}
