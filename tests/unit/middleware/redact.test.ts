import { describe, expect, it } from 'vitest';
import { describeRequest, redactHeaders, redactText, redactUrl } from '../../../src/middleware/redact.js';

describe('redactHeaders', () => {
  it('masks credential headers regardless of case', () => {
    expect(
      redactHeaders({
        Authorization: 'Bearer test-secret',
        'X-Api-Key': 'test-secret',
        'Content-Type': 'application/json',
      })
    ).toEqual({
      Authorization: '***',
      'X-Api-Key': '***',
      'Content-Type': 'application/json',
    });
  });
});

describe('redactUrl', () => {
  it('masks key query parameters', () => {
    expect(redactUrl('https://api.example.test/v1beta/models/gemini-test:streamGenerateContent?alt=sse&key=test-secret')).toBe(
      'https://api.example.test/v1beta/models/gemini-test:streamGenerateContent?alt=sse&key=***'
    );
  });

  it('leaves URLs without secrets unchanged', () => {
    expect(redactUrl('https://api.example.test/v1/chat/completions')).toBe(
      'https://api.example.test/v1/chat/completions'
    );
  });

  it('masks keys in strings that are not valid URLs', () => {
    expect(redactUrl('not a url?key=abc&x=1')).toBe('not a url?key=***&x=1');
  });
});

describe('redactText', () => {
  it('masks header values and URL keys in a command line', () => {
    const url = 'https://api.example.test/v1?key=k1';
    const text = `curl -H "Authorization: Bearer test-secret" ${url}`;

    expect(redactText(text, { Authorization: 'Bearer test-secret' }, url)).toBe(
      'curl -H "Authorization: ***" https://api.example.test/v1?key=***'
    );
  });

  it('masks a bare token without its scheme', () => {
    expect(redactText('token test-secret rejected', { Authorization: 'Bearer test-secret' })).toBe(
      'token *** rejected'
    );
  });
});

describe('describeRequest', () => {
  it('summarises a request without secrets', () => {
    expect(
      describeRequest({
        url: 'https://api.example.test/v1?key=test-secret',
        headers: { 'x-api-key': 'test-secret' },
        body: '{"a":1}',
      })
    ).toEqual({
      url: 'https://api.example.test/v1?key=***',
      headers: { 'x-api-key': '***' },
      bodyLength: 7,
    });
  });
});
