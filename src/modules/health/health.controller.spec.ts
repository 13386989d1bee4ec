import { Test, TestingModule } from '@nestjs/testing';
import { ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getDataSourceToken } from '@nestjs/typeorm';

import { HealthController } from './health.controller';

describe('HealthController', () => {
  let controller: HealthController;
  let query: jest.Mock;

  beforeEach(async () => {
    query = jest.fn().mockResolvedValue([{ '?column?': 1 }]);

    const module: TestingModule = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        { provide: getDataSourceToken(), useValue: { query } },
        { provide: ConfigService, useValue: new ConfigService({ app: { version: '2.3.4' } }) },
      ],
    }).compile();

    controller = module.get(HealthController);
  });

  it('should report the configured version', () => {
    const info = controller.getVersion();

    expect(info.version).toBe('2.3.4');
    expect(new Date(info.build).toISOString()).toBe(info.build);
  });

  it('should report healthy when the database answers', async () => {
    const health = await controller.getHealth();

    expect(health.status).toBe('healthy');
    expect(health.version).toBe('2.3.4');
    expect(health.database.status).toBe('up');
    expect(query).toHaveBeenCalledWith('SELECT 1');
  });

  it('should answer 503 when the database is unreachable', async () => {
    query.mockRejectedValue(new Error('connect ECONNREFUSED'));

    await expect(controller.getHealth()).rejects.toBeInstanceOf(ServiceUnavailableException);
    await expect(controller.getReadiness()).rejects.toBeInstanceOf(ServiceUnavailableException);
  });
});
