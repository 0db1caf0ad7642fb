import { afterEach, describe, expect, test, vi } from 'vitest';
import { z } from 'zod';
import { ConstructURLError } from '../error/constructUrlError.js';
import { DecodingError, getDecodingError } from '../error/decodingError.js';
import { EncodingError } from '../error/encodingError.js';
import { HTTPError } from '../error/httpError.js';
import { TransportError } from '../error/transportError.js';
import { getValidationError } from '../error/validationError.js';
import { FetchTransport } from '../fetch/client.js';
import { createLogger, type LogSink } from '../logging/index.js';
import type { Exchange, ReceivedResponse, SentRequest, Transport } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { JSONBody, type Serializable } from './body.js';
import { APIClient } from './client.js';
import { asData, asJson, asOptional, asText } from './decoders.js';
import { TypedRequest } from './request.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const User = z.object({ login: z.string() });

const exchangeOf = (body: string, init: Partial<ReceivedResponse> = {}): Exchange => ({
  data: encoder.encode(body),
  response: { status: 200, statusText: 'OK', headers: new Headers(), url: 'https://api.example.com', ...init },
});

/** Transport answering every request with `respond`, recording what it was asked to send. */
const fakeTransport = (respond: (request: SentRequest) => Exchange = () => exchangeOf('')) => ({
  perform: vi.fn<Transport['perform']>(async (request): SafeWrapAsync<Error, Exchange> => [null, respond(request)]),
});

/** Fetch that never settles until its signal aborts. */
const hangingFetch = vi.fn<typeof fetch>(
  (_input, init) =>
    new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason), { once: true });
    }),
);

const sentHeaders = (request: SentRequest | undefined) => Object.fromEntries(request?.headers.entries() ?? []);

afterEach(() => {
  vi.clearAllMocks();
});

describe('APIClient', () => {
  describe('Outgoing request', () => {
    test('Builds URL with ordered query and merges headers', async () => {
      const transport = fakeTransport();
      const client = new APIClient({
        baseUrl: 'https://api.example.com/v1',
        headers: { Authorization: 'Bearer test-secret' },
        transport,
      });

      const [err, response] = await client.send(
        TypedRequest.get('/users', {
          query: [['a', '1'], ['b', null], ['a', '2']],
          headers: { 'X-Trace': 'abc' },
          id: 'list-users',
        }),
      );

      expect(err).toBeNull();
      expect(transport.perform).toHaveBeenCalledOnce();
      const sent = transport.perform.mock.calls[0][0];
      expect(sent.method).toBe('GET');
      expect(sent.url).toBe('https://api.example.com/v1/users?a=1&b&a=2');
      expect(sent.body).toBeNull();
      expect(sent.id).toBe('list-users');
      expect(sentHeaders(sent)).toEqual({
        accept: 'application/json',
        authorization: 'Bearer test-secret',
        'x-trace': 'abc',
      });
      expect(response?.request).toBe(sent);
    });

    test('Per-send headers win over descriptor headers', async () => {
      const transport = fakeTransport();
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      await client.send(TypedRequest.get('/user', { headers: { 'X-Trace': 'descriptor' } }), {
        headers: { 'X-Trace': 'send', Accept: null },
      });

      expect(sentHeaders(transport.perform.mock.calls[0][0])).toEqual({ 'x-trace': 'send' });
    });

    test('Serializes JSON body and sets Content-Type', async () => {
      const transport = fakeTransport();
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      await client.send(TypedRequest.post('/users', { body: { login: 'jdoe' } }));

      const sent = transport.perform.mock.calls[0][0];
      expect(sent.method).toBe('POST');
      expect(sent.headers.get('Content-Type')).toBe('application/json');
      expect(decoder.decode(sent.body ?? new Uint8Array())).toBe('{"login":"jdoe"}');
    });

    test('Descriptor headers override the body Content-Type', async () => {
      const transport = fakeTransport();
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      await client.send(
        TypedRequest.put('/users/1', { body: { login: 'jdoe' }, headers: { 'Content-Type': 'application/merge-patch+json' } }),
      );

      expect(transport.perform.mock.calls[0][0].headers.get('Content-Type')).toBe('application/merge-patch+json');
    });

    test('Null body sends no body bytes and no Content-Type', async () => {
      const transport = fakeTransport();
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      const [err, response] = await client.send(TypedRequest.post('/ping', { body: null }));

      expect(err).toBeNull();
      expect(response?.request.body).toBeNull();
      expect(response?.request.headers.has('Content-Type')).toBe(false);
    });

    test('Sends a custom Serializable with its content type', async () => {
      const transport = fakeTransport();
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });
      const plain: Serializable = { contentType: 'text/plain', serialize: () => [null, encoder.encode('hello')] };

      await client.send(TypedRequest.post('/notes').withBody(plain));

      const sent = transport.perform.mock.calls[0][0];
      expect(sent.headers.get('Content-Type')).toBe('text/plain');
      expect(decoder.decode(sent.body ?? new Uint8Array())).toBe('hello');
    });

    test('Returns EncodingError before calling the transport', async () => {
      const transport = fakeTransport();
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      const [err, response] = await client.send(TypedRequest.post('/users', { body: { id: 1n } }));

      expect(err).toBeInstanceOf(EncodingError);
      expect(response).toBeNull();
      expect(transport.perform).not.toHaveBeenCalled();
    });

    test('Wraps a failure of a custom Serializable into EncodingError', async () => {
      const transport = fakeTransport();
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });
      const cause = new Error('boom');
      const broken: Serializable = { contentType: 'text/plain', serialize: () => [cause, null] };

      const [err] = await client.send(TypedRequest.post('/notes').withBody(broken));

      expect(err).toBeInstanceOf(EncodingError);
      expect(err?.message).toBe('error serializing POST https://api.example.com/notes body');
      expect(err?.cause).toBe(cause);
      expect(transport.perform).not.toHaveBeenCalled();
    });

    test('Wraps a throwing custom Serializable into EncodingError', async () => {
      const transport = fakeTransport();
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });
      const cause = new TypeError('boom');
      const throwing: Serializable = {
        contentType: 'text/plain',
        serialize: () => {
          throw cause;
        },
      };

      const [err, response] = await client.send(TypedRequest.post('/notes').withBody(throwing));

      expect(response).toBeNull();
      expect(err).toBeInstanceOf(EncodingError);
      expect(err?.message).toBe('error serializing POST https://api.example.com/notes body');
      expect(err?.cause).toBe(cause);
      expect(transport.perform).not.toHaveBeenCalled();
    });

    test('Refuses a body on a method without one', async () => {
      const transport = fakeTransport();
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      const [errGet] = await client.send(TypedRequest.get('/user').withBody(new JSONBody({ a: 1 })));
      const [errHead] = await client.send(TypedRequest.head('/user').withBody(new JSONBody({ a: 1 })));

      expect(errGet).toBeInstanceOf(EncodingError);
      expect(errGet?.message).toBe('error GET https://api.example.com/user cannot carry a body');
      expect(errHead).toBeInstanceOf(EncodingError);
      expect(transport.perform).not.toHaveBeenCalled();
    });

    test('Returns ConstructURLError for an invalid URL', async () => {
      const transport = fakeTransport();
      const client = new APIClient({ baseUrl: 'not a url', transport });

      const [err] = await client.send(TypedRequest.get('/user'));

      expect(err).toBeInstanceOf(ConstructURLError);
      expect(transport.perform).not.toHaveBeenCalled();
    });
  });

  describe('Decoding', () => {
    test('Decodes JSON into the expected type', async () => {
      const transport = fakeTransport(() => exchangeOf('{"login":"jdoe"}'));
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      const [err, response] = await client.send(TypedRequest.get('/user', { response: asJson(User) }));

      expect(err).toBeNull();
      expect(response?.value).toEqual({ login: 'jdoe' });
      expect(response?.value.login).toBe('jdoe');
      expect(response?.statusCode).toBe(200);
      expect(decoder.decode(response?.data)).toBe('{"login":"jdoe"}');
    });

    test('Keeps raw bytes untouched', async () => {
      const transport = fakeTransport(() => exchangeOf('<h>Hello</h>', { headers: new Headers({ 'Content-Type': 'text/html' }) }));
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      const [err, response] = await client.send(TypedRequest.get('/page', { response: asData() }));

      expect(err).toBeNull();
      expect(response?.value).toEqual(encoder.encode('<h>Hello</h>'));
      expect(response?.value).toBe(response?.data);
    });

    test('Decodes text', async () => {
      const transport = fakeTransport(() => exchangeOf('héllo'));
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      const [, response] = await client.send(TypedRequest.get('/greeting', { response: asText() }));

      expect(response?.value).toBe('héllo');
    });

    test('Ignores the body of a request expecting no value', async () => {
      const transport = fakeTransport(() => exchangeOf('not json'));
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      const [err, response] = await client.send(TypedRequest.delete('/users/1'));

      expect(err).toBeNull();
      expect(response?.value).toBeUndefined();
      expect(decoder.decode(response?.data)).toBe('not json');
    });

    test('Empty body is null for an optional value', async () => {
      const transport = fakeTransport(() => exchangeOf(''));
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      const [err, response] = await client.send(TypedRequest.get('/user', { response: asOptional(User) }));

      expect(err).toBeNull();
      expect(response?.value).toBeNull();
    });

    test('Empty body fails for a required value', async () => {
      const transport = fakeTransport(() => exchangeOf(''));
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      const [err, response] = await client.send(TypedRequest.get('/user', { response: asJson(User) }));

      expect(response).toBeNull();
      expect(err).toBeInstanceOf(DecodingError);
      expect(getDecodingError(err)?.target).toBe('json');
    });

    test('Wrong-shape JSON fails with the schema issues as cause', async () => {
      const transport = fakeTransport(() => exchangeOf('{"login":42}'));
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      const [err] = await client.send(TypedRequest.get('/user', { response: asJson(User) }));

      expect(err).toBeInstanceOf(DecodingError);
      const validation = getValidationError(err);
      expect(validation?.issues).toHaveLength(1);
      expect(validation?.issues[0].path).toEqual(['login']);
    });

    test('data() keeps raw bytes whatever the decoder', async () => {
      const transport = fakeTransport(() => exchangeOf('not json'));
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      const [err, response] = await client.data(TypedRequest.get('/user', { response: asJson(User) }));

      expect(err).toBeNull();
      expect(decoder.decode(response?.value)).toBe('not json');
    });

    test('map() keeps every other field of the envelope', async () => {
      const transport = fakeTransport(() => exchangeOf('{"login":"jdoe"}'));
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      const [, response] = await client.send(TypedRequest.get('/user', { response: asJson(User) }));
      const login = response?.map((user) => user.login);

      expect(login?.value).toBe('jdoe');
      expect(login?.data).toBe(response?.data);
      expect(login?.request).toBe(response?.request);
      expect(login?.response).toBe(response?.response);
    });
  });

  describe('Status validation', () => {
    test('Rejects non-2xx with HTTPError carrying the body', async () => {
      const transport = fakeTransport(() => exchangeOf('{"message":"missing"}', { status: 404, statusText: 'Not Found' }));
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      const [err, response] = await client.send(TypedRequest.get('/user', { response: asJson(User) }));

      expect(response).toBeNull();
      expect(err).toBeInstanceOf(HTTPError);
      expect(err?.message).toBe('error unacceptable status code 404 in GET https://api.example.com/user exchange');
      if (err instanceof HTTPError) {
        expect(err.statusCode).toBe(404);
        expect(decoder.decode(err.data)).toBe('{"message":"missing"}');
      }
    });

    test('Custom validateStatus accepts other codes', async () => {
      const transport = fakeTransport(() => exchangeOf('{"login":"jdoe"}', { status: 404 }));
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport, validateStatus: () => true });

      const [err, response] = await client.send(TypedRequest.get('/user', { response: asJson(User) }));

      expect(err).toBeNull();
      expect(response?.statusCode).toBe(404);
      expect(response?.value.login).toBe('jdoe');
    });
  });

  describe('Transport failures', () => {
    test('Propagates TransportError unchanged', async () => {
      const failure = new TransportError('error offline', 'network');
      const transport = { perform: vi.fn<Transport['perform']>(async (): SafeWrapAsync<Error, Exchange> => [failure, null]) };
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      const [err] = await client.send(TypedRequest.get('/user'));

      expect(err).toBe(failure);
    });

    test('Wraps other errors of a custom transport', async () => {
      const cause = new Error('socket hang up');
      const transport: Transport = {
        perform: async () => {
          throw cause;
        },
      };
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      const [err] = await client.send(TypedRequest.get('/user'));

      expect(err).toBeInstanceOf(TransportError);
      if (err instanceof TransportError) {
        expect(err.code).toBe('network');
        expect(err.cause).toBe(cause);
      }
    });
  });

  describe('Cancellation', () => {
    test('Cancelling an in-flight send yields a cancelled TransportError', async () => {
      const client = new APIClient({
        baseUrl: 'https://api.example.com',
        transport: new FetchTransport({ fetch: hangingFetch }),
      });
      const controller = new AbortController();

      const pending = client.send(TypedRequest.get('/user', { response: asJson(User) }), { signal: controller.signal });
      controller.abort();
      const [err, response] = await pending;

      expect(response).toBeNull();
      expect(err).toBeInstanceOf(TransportError);
      if (err instanceof TransportError) {
        expect(err.code).toBe('cancelled');
      }
    });

    test('Never decodes an exchange cancelled while in flight', async () => {
      const controller = new AbortController();
      const transport = fakeTransport(() => {
        controller.abort();
        return exchangeOf('not json');
      });
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      const [err] = await client.send(TypedRequest.get('/user', { response: asJson(User) }), { signal: controller.signal });

      expect(err).toBeInstanceOf(TransportError);
      expect(err).not.toBeInstanceOf(DecodingError);
      if (err instanceof TransportError) {
        expect(err.cancelled).toBe(true);
      }
    });

    test('Already aborted signal never reaches the transport', async () => {
      const transport = fakeTransport();
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      const [err] = await client.send(TypedRequest.get('/user'), { signal: AbortSignal.abort() });

      expect(err).toBeInstanceOf(TransportError);
      expect(transport.perform).not.toHaveBeenCalled();
    });

    test('Times out with a timeout TransportError', async () => {
      const client = new APIClient({
        baseUrl: 'https://api.example.com',
        timeout: 5,
        transport: new FetchTransport({ fetch: hangingFetch }),
      });

      const [err] = await client.send(TypedRequest.get('/user'));

      expect(err).toBeInstanceOf(TransportError);
      if (err instanceof TransportError) {
        expect(err.code).toBe('timeout');
        expect(err.message).toBe('error GET https://api.example.com/user exchange timed out');
      }
    });

    test('Per-send timeout overrides the client timeout', async () => {
      const client = new APIClient({
        baseUrl: 'https://api.example.com',
        timeout: false,
        transport: new FetchTransport({ fetch: hangingFetch }),
      });

      const [err] = await client.send(TypedRequest.get('/user'), { timeout: 5 });

      expect(err).toBeInstanceOf(TransportError);
      if (err instanceof TransportError) {
        expect(err.code).toBe('timeout');
      }
    });

    test('dispose() cancels in-flight and later sends', async () => {
      const transport = new FetchTransport({ fetch: hangingFetch });
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

      const pending = client.send(TypedRequest.get('/user'));
      client.dispose();
      const [errInFlight] = await pending;
      const [errLater] = await client.send(TypedRequest.get('/user'));

      expect(errInFlight).toBeInstanceOf(TransportError);
      expect(errLater).toBeInstanceOf(TransportError);
      if (errInFlight instanceof TransportError && errLater instanceof TransportError) {
        expect(errInFlight.code).toBe('cancelled');
        expect(errLater.code).toBe('cancelled');
      }
      expect(hangingFetch).toHaveBeenCalledOnce();
    });
  });

  test('Concurrent sends each get their own request and response', async () => {
    const Echo = z.object({ url: z.string() });
    const transport: Transport = {
      perform: async (request): SafeWrapAsync<Error, Exchange> => {
        // Slowest request first, so responses complete out of order
        const delay = request.url.endsWith('/1') ? 15 : request.url.endsWith('/2') ? 5 : 0;
        await new Promise((resolve) => setTimeout(resolve, delay));
        return [null, exchangeOf(JSON.stringify({ url: request.url }))];
      },
    };
    const client = new APIClient({ baseUrl: 'https://api.example.com', transport });

    const results = await Promise.all(
      ['1', '2', '3'].map((id) => client.send(TypedRequest.get(`/items/${id}`, { response: asJson(Echo), id }))),
    );

    for (const [index, [err, response]] of results.entries()) {
      expect(err).toBeNull();
      expect(response?.request.id).toBe(String(index + 1));
      expect(response?.value.url).toBe(`https://api.example.com/items/${index + 1}`);
      expect(response?.request.url).toBe(response?.value.url);
    }
  });

  describe('Configuration', () => {
    test('url() returns the target of send', () => {
      const client = new APIClient({ baseUrl: 'https://api.example.com/v1/', transport: fakeTransport() });

      expect(client.url(TypedRequest.get('/search', { query: [['q', 'a b'], ['flag']] }))).toEqual([
        null,
        'https://api.example.com/v1/search?q=a%20b&flag',
      ]);
      expect(client.url(TypedRequest.get('https://cdn.example.com/logo.png'))).toEqual([
        null,
        'https://cdn.example.com/logo.png',
      ]);
    });

    test('config() updates base URL and merges headers', async () => {
      const transport = fakeTransport();
      const client = new APIClient({ baseUrl: 'https://api.example.com', headers: { 'X-Client': 'one' }, transport });

      client.config({ baseUrl: 'https://staging.example.com', headers: { 'X-Client': null, 'X-Env': 'staging' } });
      await client.send(TypedRequest.get('/user'));

      const sent = transport.perform.mock.calls[0][0];
      expect(sent.url).toBe('https://staging.example.com/user');
      expect(sentHeaders(sent)).toEqual({ accept: 'application/json', 'x-env': 'staging' });
    });

    test('config() swaps the transport', async () => {
      const first = fakeTransport();
      const second = fakeTransport();
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport: first });

      client.config({ transport: second });
      await client.send(TypedRequest.get('/user'));

      expect(first.perform).not.toHaveBeenCalled();
      expect(second.perform).toHaveBeenCalledOnce();
    });
  });

  describe('Logging', () => {
    test('Logs exchanges at debug level with redacted headers', async () => {
      const sink = vi.fn<LogSink>();
      const logger = createLogger({ name: 'http', level: 'debug', sink, now: () => new Date('2024-01-01T00:00:00.000Z') });
      const transport = fakeTransport(() => exchangeOf('{"login":"jdoe"}'));
      const client = new APIClient({
        baseUrl: 'https://api.example.com',
        headers: { Authorization: 'Bearer test-secret' },
        transport,
        logger,
      });

      await client.send(TypedRequest.get('/user', { response: asJson(User) }));

      expect(sink.mock.calls).toEqual([
        [
          'debug',
          '[2024-01-01T00:00:00.000Z] [DEBUG] [http] sending request {"method":"GET","url":"https://api.example.com/user","headers":{"accept":"application/json","authorization":"[REDACTED]"}}',
        ],
        [
          'debug',
          '[2024-01-01T00:00:00.000Z] [DEBUG] [http] received response {"method":"GET","url":"https://api.example.com/user","status":200,"bytes":16}',
        ],
      ]);
    });

    test('Logs failures at warn level', async () => {
      const sink = vi.fn<LogSink>();
      const logger = createLogger({ level: 'warn', sink, now: () => new Date('2024-01-01T00:00:00.000Z') });
      const transport = fakeTransport(() => exchangeOf('', { status: 500 }));
      const client = new APIClient({ baseUrl: 'https://api.example.com', transport, logger });

      await client.send(TypedRequest.get('/user'));

      expect(sink).toHaveBeenCalledOnce();
      expect(sink).toHaveBeenCalledWith(
        'warn',
        '[2024-01-01T00:00:00.000Z] [WARN] unacceptable status code {"method":"GET","url":"https://api.example.com/user","status":500}',
      );
    });
  });
});
