import { paginate } from './pagination.interface';

describe('paginate', () => {
  it('flags further pages in both directions', () => {
    expect(paginate(['b', 'c'], 5, 2, 1)).toEqual({
      data: ['b', 'c'],
      pagination: { limit: 2, offset: 1, total: 5, hasNext: true, hasPrev: true },
    });
  });

  it('stops at the last page', () => {
    expect(paginate(['e'], 5, 2, 4).pagination).toMatchObject({
      hasNext: false,
      hasPrev: true,
    });
    expect(paginate([], 0, 50, 0).pagination).toMatchObject({
      hasNext: false,
      hasPrev: false,
    });
  });
});
