import { resolvePage } from './pagination.utils';

describe('resolvePage', () => {
  const limits = { defaultLimit: 20, maxLimit: 100 };

  it('should apply the default limit', () => {
    expect(resolvePage({}, limits)).toEqual({ skip: 0, take: 20 });
  });

  it('should cap the limit', () => {
    expect(resolvePage({ skip: 40, limit: 500 }, limits)).toEqual({ skip: 40, take: 100 });
  });

  it('should keep a requested limit under the cap', () => {
    expect(resolvePage({ limit: 5 }, limits)).toEqual({ skip: 0, take: 5 });
  });
});
