import { Controller, Get, INestApplication } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { Test } from '@nestjs/testing';
import { ThrottlerModule } from '@nestjs/throttler';
import request from 'supertest';
import { UserThrottlerGuard } from './user-throttler.guard';

@Controller('ping')
class PingController {
  @Get()
  ping(): { ok: boolean } {
    return { ok: true };
  }
}

describe('UserThrottlerGuard', () => {
  let app: INestApplication;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [ThrottlerModule.forRoot([{ ttl: 60_000, limit: 1 }])],
      controllers: [PingController],
      providers: [{ provide: APP_GUARD, useClass: UserThrottlerGuard }],
    }).compile();

    app = moduleRef.createNestApplication();
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it('counts requests per x-user-id header', async () => {
    await request(app.getHttpServer()).get('/ping').set('x-user-id', '7').expect(200);
    await request(app.getHttpServer()).get('/ping').set('x-user-id', '7').expect(429);
    await request(app.getHttpServer()).get('/ping').set('x-user-id', '8').expect(200);
  });

  it('falls back to the client address without the header', async () => {
    await request(app.getHttpServer()).get('/ping').expect(200);
    await request(app.getHttpServer()).get('/ping').expect(429);
    await request(app.getHttpServer()).get('/ping').set('x-user-id', '7').expect(200);
  });
});
