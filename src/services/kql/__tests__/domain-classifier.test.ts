import { DomainClassificationError } from '../../../core/errors.js';
import { PODS_PENDING_SIGNAL, TABLE_SIGNAL, classifyDomain } from '../domain-classifier.js';

describe('classifyDomain', () => {
  test('pods pending in a namespace routes to containers', () => {
    const result = classifyDomain('show me pods pending in namespace X');

    expect(result.domain).toBe('containers');
    expect(result.matches.containers).toEqual(['pods', 'namespace', 'pending', PODS_PENDING_SIGNAL]);
    expect(result.matches.appinsights).toEqual([]);
  });

  test('pods pending wins over application keywords', () => {
    const result = classifyDomain('which app requests are blocked by pods pending');

    expect(result.matches.appinsights).toEqual(['app', 'requests']);
    expect(result.domain).toBe('containers');
    expect(result.reason).toBe('strong-signal');
  });

  test('a container table name is a strong signal on conflict', () => {
    const result = classifyDomain('count exceptions in ContainerLogV2');

    expect(result.matches.containers).toContain(TABLE_SIGNAL);
    expect(result.domain).toBe('containers');
    expect(result.reason).toBe('strong-signal');
  });

  test('conflict without a strong container signal defaults to appinsights', () => {
    const result = classifyDomain('request latency for each workload');

    expect(result.matches.appinsights).toEqual(['request']);
    expect(result.matches.containers).toEqual(['latency', 'workload']);
    expect(result.domain).toBe('appinsights');
    expect(result.reason).toBe('default-on-conflict');
  });

  test('application-only questions route to appinsights', () => {
    const result = classifyDomain('show failed requests from the last hour');
    expect(result.domain).toBe('appinsights');
    expect(result.reason).toBe('exclusive');
  });

  test('app table names count as a match', () => {
    const result = classifyDomain('top rows of AppDependencies');
    expect(result.domain).toBe('appinsights');
    expect(result.matches.appinsights).toEqual(['appdependencies', TABLE_SIGNAL]);
  });

  test('keywords match whole words only', () => {
    // "happy" contains "app", "podcast" contains "pod"
    expect(() => classifyDomain('happy podcast listeners')).toThrow(DomainClassificationError);
  });

  test('multi-word keywords match across spacing', () => {
    const result = classifyDomain('find every stack  trace');
    expect(result.matches.containers).toEqual(['stack trace']);
    expect(result.matches.appinsights).toEqual(['trace']);
    expect(result.domain).toBe('appinsights');
  });

  test.each(['what is the weather', 'hello', '', 'sum of all values yesterday'])(
    'no signal raises instead of defaulting: %p',
    (question) => {
      expect(() => classifyDomain(question)).toThrow(DomainClassificationError);
    }
  );

  test('the ambiguity error carries both match sets', () => {
    try {
      classifyDomain('what is the weather');
      throw new Error('expected classification to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(DomainClassificationError);
      if (error instanceof DomainClassificationError) {
        expect(error.code).toBe('DOMAIN_AMBIGUOUS');
        expect(error.matches).toEqual({ appinsights: [], containers: [] });
        expect(error.message).toContain('Unable to classify domain');
      }
    }
  });
});
