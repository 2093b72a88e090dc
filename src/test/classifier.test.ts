import {classify, describeResponseCode} from '../library/index.js';

test('classify successful responses', () => {
  expect(classify(200, 'good 1.2.3.4')).toEqual({type: 'updated'});
  expect(classify(200, 'nochg 1.2.3.4')).toEqual({type: 'unchanged'});
});

test('classify failed responses', () => {
  expect(classify(200, 'badauth')).toEqual({type: 'failed', detail: 'badauth'});
  expect(classify(200, '')).toEqual({type: 'failed', detail: ''});
  expect(classify(201, 'nohost\n')).toEqual({
    type: 'failed',
    detail: 'nohost\n',
  });
});

test('http status dominates body', () => {
  expect(classify(302, 'good')).toEqual({
    type: 'failed',
    detail: 'http status 302',
  });
  expect(classify(500, 'nochg 1.2.3.4')).toEqual({
    type: 'failed',
    detail: 'http status 500',
  });
});

test('body matching is case sensitive', () => {
  expect(classify(200, 'GOOD 1.2.3.4')).toEqual({
    type: 'failed',
    detail: 'GOOD 1.2.3.4',
  });
});

test('describe response code', () => {
  expect(describeResponseCode('badauth')).toBe(
    'the username / password combination is not valid for the host',
  );
  expect(describeResponseCode(' 911\n')).toBe(
    'an error happened on the provider end, wait 5 minutes and retry',
  );
  expect(describeResponseCode('something else')).toBeUndefined();
  expect(describeResponseCode('constructor')).toBeUndefined();
});
