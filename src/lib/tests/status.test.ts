import { classify, statusCode } from '../status';

describe('classify', () => {
  test('check marker means present', () => {
    expect(classify({ hasCheck: true, hasCross: false, text: '' })).toBe('Present');
  });

  test('check marker wins over x marker', () => {
    expect(classify({ hasCheck: true, hasCross: true, text: 'NA' })).toBe('Present');
  });

  test('x marker wins over NA text', () => {
    expect(classify({ hasCheck: false, hasCross: true, text: 'NA' })).toBe('Absent');
  });

  test('trimmed NA text means not applicable', () => {
    expect(classify({ hasCheck: false, hasCross: false, text: '  NA \n' })).toBe('NotApplicable');
  });

  test('anything else is unknown', () => {
    expect(classify({ hasCheck: false, hasCross: false, text: 'N/A' })).toBe('Unknown');
    expect(classify({ hasCheck: false, hasCross: false, text: 'na' })).toBe('Unknown');
    expect(classify({ hasCheck: false, hasCross: false, text: '' })).toBe('Unknown');
  });
});

describe('statusCode', () => {
  test('maps statuses to the stored codes', () => {
    expect(statusCode('Present')).toBe('P');
    expect(statusCode('Absent')).toBe('A');
    expect(statusCode('NotApplicable')).toBe('NA');
    expect(statusCode('Unknown')).toBe('Unknown');
  });
});
