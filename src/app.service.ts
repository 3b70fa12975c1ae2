import { Injectable } from '@nestjs/common';

export interface HealthStatus {
  message: string;
  status: 'healthy';
}

@Injectable()
export class AppService {
  getHealth(): HealthStatus {
    return { message: 'Storefront API server is running.', status: 'healthy' };
  }
}
