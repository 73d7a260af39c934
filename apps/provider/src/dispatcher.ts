import { RequestError, type Octokit } from "octokit";
import {
  GraphQLEnvelopeSchema,
  authorizationHeader,
  type AccessToken,
  type GraphQLEnvelope,
  type Operation,
} from "@ghgql/shared";
import { abortable, createLimiter, type Limiter } from "./concurrency.js";
import { previewAccept } from "./client.js";
import { ProtocolError, TransportError } from "./errors.js";

const GRAPHQL_ENDPOINT = "POST /graphql";

export type TokenSource = () => Promise<AccessToken>;

export interface DispatchOptions {
  signal?: AbortSignal;
}

/**
 * Sends one GraphQL operation and decodes the envelope.
 *
 * GraphQL `errors` in a 2xx response are returned as data, not thrown.
 * Subclasses only decide how calls are scheduled.
 */
export abstract class GraphQLDispatcher {
  private readonly accept: string | undefined;

  constructor(
    protected readonly octokit: Octokit,
    previews: readonly string[] = [],
  ) {
    this.accept = previewAccept(previews);
  }

  /** Acquire a token from `source`, then send `operation` with it. */
  abstract dispatch(
    source: TokenSource,
    operation: Operation,
    options?: DispatchOptions,
  ): Promise<GraphQLEnvelope>;

  async send(token: AccessToken, operation: Operation, signal?: AbortSignal): Promise<GraphQLEnvelope> {
    const res = await this.octokit
      .request(GRAPHQL_ENDPOINT, {
        query: operation.document,
        variables: operation.variables,
        headers: {
          authorization: authorizationHeader(token),
          ...(this.accept ? { accept: this.accept } : {}),
        },
        request: signal ? { signal } : {},
      })
      .catch((err: unknown): never => {
        if (err instanceof RequestError) {
          console.error(`[dispatch] ${operation.name} failed: ${err.status}`);
          throw new TransportError(`${GRAPHQL_ENDPOINT} failed: ${err.status}`, {
            endpoint: GRAPHQL_ENDPOINT,
            status: err.status,
            body: err.response?.data,
            cause: err,
          });
        }
        throw err;
      });

    const parsed = GraphQLEnvelopeSchema.safeParse(res.data);
    if (!parsed.success) {
      throw new ProtocolError(`${GRAPHQL_ENDPOINT} returned a malformed GraphQL envelope`, {
        endpoint: GRAPHQL_ENDPOINT,
        status: res.status,
        body: res.data,
      });
    }

    const errorCount = parsed.data.errors?.length ?? 0;
    console.log(
      `[dispatch] ${operation.name} -> ${res.status}` +
        (errorCount > 0 ? ` with ${errorCount} GraphQL error(s)` : ""),
    );
    return parsed.data;
  }
}

/**
 * Blocking mode: one call at a time. Each call holds the lane through token
 * acquisition and the GraphQL exchange; later calls queue behind it.
 */
export class BlockingDispatcher extends GraphQLDispatcher {
  private readonly lane: Limiter = createLimiter(1);

  dispatch(source: TokenSource, operation: Operation): Promise<GraphQLEnvelope> {
    return this.lane(async () => this.send(await source(), operation));
  }
}

/**
 * Concurrent mode: calls interleave and suspend only on I/O.
 * Aborting `signal` abandons this caller's wait, never a shared token exchange.
 */
export class ConcurrentDispatcher extends GraphQLDispatcher {
  async dispatch(
    source: TokenSource,
    operation: Operation,
    options: DispatchOptions = {},
  ): Promise<GraphQLEnvelope> {
    const token = await abortable(source(), options.signal);
    return this.send(token, operation, options.signal);
  }
}
