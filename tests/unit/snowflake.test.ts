import { compareSnowflakes, isSnowflake, snowflakeToDate } from '../../src/utils/snowflake';

describe('snowflake', () => {
  it('should decode the creation time of an ID', () => {
    expect(snowflakeToDate('175928847299117063')?.toISOString()).toBe('2016-04-30T11:18:25.796Z');
  });

  it('should return null for placeholder IDs', () => {
    expect(isSnowflake('synthetic:count_delta:1:members:3')).toBe(false);
    expect(snowflakeToDate('synthetic:count_delta:1:members:3')).toBeNull();
  });

  it('should order IDs numerically', () => {
    expect(compareSnowflakes('99', '100')).toBe(-1);
    expect(compareSnowflakes('175928847299117063', '175928847299117062')).toBe(1);
    expect(compareSnowflakes('175928847299117063', '175928847299117063')).toBe(0);
  });
});
