import type { HttpMethod, QueryItem, QueryItems } from '../types/request.js';
import { boxBody, type Serializable } from './body.js';
import { asVoid } from './decoders.js';
import type {
  BodyRequestOptions,
  ExpectedResponse,
  RequestOptions,
  ResponseDecoder,
  WithoutResponse,
} from './types.js';

/** Fields of a {@link TypedRequest}. */
export interface TypedRequestInit<Result> {
  method: HttpMethod;
  path: string;
  query?: QueryItems;
  body?: Serializable;
  headers?: Record<string, string>;
  id?: string;
  response: ResponseDecoder<Result>;
}

/**
 * Immutable description of an HTTP call, parameterized by the expected result type.
 *
 * `Result` only exists at the type level; at runtime it is carried by the `response`
 * decoder, which the client uses to turn the body into the value.
 *
 * @example
 * const User = z.object({ login: z.string() });
 * const request = TypedRequest.get('/user', { response: asJson(User) }); // TypedRequest<{ login: string }>
 * const create = TypedRequest.post('/users', { body: { login: 'octocat' } }); // TypedRequest<void>
 */
export class TypedRequest<Result> {
  readonly method: HttpMethod;
  /** Relative or absolute path; joined with the client's base URL at send-time. */
  readonly path: string;
  readonly query?: QueryItems;
  readonly body?: Serializable;
  readonly headers?: Readonly<Record<string, string>>;
  readonly id?: string;
  readonly response: ResponseDecoder<Result>;

  /** Creates a frozen descriptor; query items and headers are copied. */
  constructor({ method, path, query, body, headers, id, response }: TypedRequestInit<Result>) {
    this.method = method;
    this.path = path;
    this.query = query && Object.freeze(query.map(([key, value]): QueryItem => [key, value]));
    this.body = body;
    this.headers = headers && Object.freeze({ ...headers });
    this.id = id;
    this.response = response;

    Object.freeze(this);
  }

  static get(path: string, options?: WithoutResponse<RequestOptions>): TypedRequest<void>;
  static get<Result>(path: string, options: RequestOptions & ExpectedResponse<Result>): TypedRequest<Result>;
  static get<Result>(
    path: string,
    options: RequestOptions & Partial<ExpectedResponse<Result>> = {},
  ): TypedRequest<Result | void> {
    return TypedRequest.#create('GET', path, options);
  }

  static post(path: string, options?: WithoutResponse<BodyRequestOptions>): TypedRequest<void>;
  static post<Result>(path: string, options: BodyRequestOptions & ExpectedResponse<Result>): TypedRequest<Result>;
  static post<Result>(
    path: string,
    options: BodyRequestOptions & Partial<ExpectedResponse<Result>> = {},
  ): TypedRequest<Result | void> {
    return TypedRequest.#create('POST', path, options);
  }

  static put(path: string, options?: WithoutResponse<BodyRequestOptions>): TypedRequest<void>;
  static put<Result>(path: string, options: BodyRequestOptions & ExpectedResponse<Result>): TypedRequest<Result>;
  static put<Result>(
    path: string,
    options: BodyRequestOptions & Partial<ExpectedResponse<Result>> = {},
  ): TypedRequest<Result | void> {
    return TypedRequest.#create('PUT', path, options);
  }

  static patch(path: string, options?: WithoutResponse<BodyRequestOptions>): TypedRequest<void>;
  static patch<Result>(path: string, options: BodyRequestOptions & ExpectedResponse<Result>): TypedRequest<Result>;
  static patch<Result>(
    path: string,
    options: BodyRequestOptions & Partial<ExpectedResponse<Result>> = {},
  ): TypedRequest<Result | void> {
    return TypedRequest.#create('PATCH', path, options);
  }

  static delete(path: string, options?: WithoutResponse<BodyRequestOptions>): TypedRequest<void>;
  static delete<Result>(path: string, options: BodyRequestOptions & ExpectedResponse<Result>): TypedRequest<Result>;
  static delete<Result>(
    path: string,
    options: BodyRequestOptions & Partial<ExpectedResponse<Result>> = {},
  ): TypedRequest<Result | void> {
    return TypedRequest.#create('DELETE', path, options);
  }

  static options(path: string, options?: WithoutResponse<RequestOptions>): TypedRequest<void>;
  static options<Result>(path: string, options: RequestOptions & ExpectedResponse<Result>): TypedRequest<Result>;
  static options<Result>(
    path: string,
    options: RequestOptions & Partial<ExpectedResponse<Result>> = {},
  ): TypedRequest<Result | void> {
    return TypedRequest.#create('OPTIONS', path, options);
  }

  static head(path: string, options?: WithoutResponse<RequestOptions>): TypedRequest<void>;
  static head<Result>(path: string, options: RequestOptions & ExpectedResponse<Result>): TypedRequest<Result>;
  static head<Result>(
    path: string,
    options: RequestOptions & Partial<ExpectedResponse<Result>> = {},
  ): TypedRequest<Result | void> {
    return TypedRequest.#create('HEAD', path, options);
  }

  static trace(path: string, options?: WithoutResponse<RequestOptions>): TypedRequest<void>;
  static trace<Result>(path: string, options: RequestOptions & ExpectedResponse<Result>): TypedRequest<Result>;
  static trace<Result>(
    path: string,
    options: RequestOptions & Partial<ExpectedResponse<Result>> = {},
  ): TypedRequest<Result | void> {
    return TypedRequest.#create('TRACE', path, options);
  }

  /**
   * Shared implementation of the method constructors; a missing decoder means no value.
   */
  static #create<Result>(
    method: HttpMethod,
    path: string,
    { query, body, headers, id, response }: BodyRequestOptions & Partial<ExpectedResponse<Result>>,
  ): TypedRequest<Result | void> {
    return new TypedRequest<Result | void>({
      method,
      path,
      query,
      body: boxBody(body),
      headers,
      id,
      response: response ?? asVoid(),
    });
  }

  /** Copies the descriptor with the given fields replaced. */
  #copy<Next = Result>(changes: Partial<TypedRequestInit<Next>> & Pick<TypedRequestInit<Next>, 'response'>): TypedRequest<Next> {
    return new TypedRequest<Next>({
      method: this.method,
      path: this.path,
      query: this.query,
      body: this.body,
      headers: this.headers,
      id: this.id,
      ...changes,
    });
  }

  /**
   * Returns a descriptor expecting a different result, e.g. `request.expecting(asData())`.
   */
  expecting<Next>(response: ResponseDecoder<Next>): TypedRequest<Next> {
    return this.#copy<Next>({ response });
  }

  /**
   * Returns a descriptor with `headers` merged over the current header overrides.
   */
  withHeaders(headers: Record<string, string>): TypedRequest<Result> {
    return this.#copy({ response: this.response, headers: { ...this.headers, ...headers } });
  }

  /**
   * Returns a descriptor with `query` appended after the current query items.
   */
  withQuery(query: QueryItems): TypedRequest<Result> {
    return this.#copy({ response: this.response, query: [...(this.query ?? []), ...query] });
  }

  /**
   * Returns a descriptor with a replaced body box; `null` removes the body.
   * Only POST, PUT, PATCH and DELETE may carry one: the client refuses to send a body
   * on any other method with an `EncodingError`.
   */
  withBody(body: Serializable | null): TypedRequest<Result> {
    return this.#copy({ response: this.response, body: body ?? undefined });
  }

  /**
   * Returns a descriptor with a correlation id.
   */
  withId(id: string): TypedRequest<Result> {
    return this.#copy({ response: this.response, id });
  }
}
