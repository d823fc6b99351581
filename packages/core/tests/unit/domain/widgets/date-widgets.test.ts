import { describe, it, expect } from 'vitest';
import { DateWidget } from '../../../../src/domain/widgets/DateWidget.js';
import { DateTimeWidget } from '../../../../src/domain/widgets/DateTimeWidget.js';
import { parseDate, formatDate } from '../../../../src/domain/widgets/dateFormat.js';
import { ConversionError } from '../../../../src/domain/errors/RecordSyncError.js';

describe('parseDate / formatDate', () => {
  it('should parse every supported token in UTC', () => {
    const date = parseDate('2024-03-09 14:05:30', 'YYYY-MM-DD HH:mm:ss');
    expect(date?.toISOString()).toBe('2024-03-09T14:05:30.000Z');
  });

  it('should match literals exactly', () => {
    expect(parseDate('09/03/2024', 'DD/MM/YYYY')?.toISOString()).toBe('2024-03-09T00:00:00.000Z');
    expect(parseDate('09-03-2024', 'DD/MM/YYYY')).toBeNull();
  });

  it('should reject impossible dates', () => {
    expect(parseDate('2023-02-30', 'YYYY-MM-DD')).toBeNull();
  });

  it('should format with zero padding', () => {
    expect(formatDate(new Date(Date.UTC(2024, 0, 5, 7, 8, 9)), 'DD.MM.YYYY HH:mm:ss')).toBe('05.01.2024 07:08:09');
  });
});

describe('DateWidget', () => {
  it('should clean ISO dates by default', () => {
    expect(new DateWidget().clean('2024-03-09')?.toISOString()).toBe('2024-03-09T00:00:00.000Z');
  });

  it('should try every format and render with the first', () => {
    const widget = new DateWidget({ format: ['DD/MM/YYYY', 'YYYY-MM-DD'] });
    const date = widget.clean('2024-03-09');
    expect(widget.render(date)).toBe('09/03/2024');
  });

  it('should pass Date values through', () => {
    const date = new Date(Date.UTC(2020, 1, 29));
    expect(new DateWidget().clean(date)).toBe(date);
  });

  it('should reject text matching no format', () => {
    expect(() => new DateWidget().clean('March 9')).toThrow(ConversionError);
    expect(() => new DateWidget().clean('March 9')).toThrow("Enter a valid date, got 'March 9'.");
  });

  it('should refuse an empty format list', () => {
    expect(() => new DateWidget({ format: [] })).toThrow(RangeError);
  });
});

describe('DateTimeWidget', () => {
  it('should round-trip its default format', () => {
    const widget = new DateTimeWidget();
    expect(widget.render(widget.clean('2024-03-09 14:05:30'))).toBe('2024-03-09 14:05:30');
  });

  it('should use its own error message', () => {
    expect(() => new DateTimeWidget().clean('2024-03-09')).toThrow(
      "Enter a valid date/time, got '2024-03-09'.",
    );
  });

  it('should render blank for null', () => {
    expect(new DateTimeWidget().render(null)).toBe('');
  });
});
