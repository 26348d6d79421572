import Fastify, { type FastifyInstance, type InjectOptions, type LightMyRequestResponse } from "fastify";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import type { Logger } from "../utils/logger.js";
import { createCorrelationId, withContext } from "../core/correlation.js";
import type { PublishService } from "../publishing/service.js";
import { PublishRequestSchema } from "../publishing/types.js";
import { hasValidSecret } from "./validation.js";

export interface RestApiOptions {
  secret: string;
  rateLimitPerMinute?: number;
}

export class RestApi {
  private app: FastifyInstance = Fastify({ logger: false });
  private routes: string[] = [];

  constructor(
    private logger: Logger,
    private service: Pick<PublishService, "submit">,
    private options: RestApiOptions
  ) {
    this.app.addHook("onRoute", (route) => {
      if (!this.routes.includes(route.url)) this.routes.push(route.url);
    });
    void this.app.register(helmet);
    void this.app.register(rateLimit, {
      max: options.rateLimitPerMinute ?? 60,
      timeWindow: "1 minute",
    });
    // Routes live in their own plugin so they load after the hooks above
    void this.app.register(async (instance) => this.setupRoutes(instance));
  }

  private setupRoutes(app: FastifyInstance): void {
    app.get("/", async () => ({ msg: "OK" }));

    app.get("/api-endpoint", async () => ({ status: "ok" }));

    app.get("/debug-routes", async () => [...this.routes]);

    app.post("/api-endpoint", async (request, reply) => {
      const body: unknown = request.body;

      if (!hasValidSecret(body, this.options.secret)) {
        this.logger.warn({ ip: request.ip }, "Invalid secret received");
        return { error: "Invalid secret" };
      }

      const parsed = PublishRequestSchema.safeParse(body);
      if (!parsed.success) {
        this.logger.warn({ errors: parsed.error.flatten() }, "Invalid request payload");
        return reply.code(400).send({
          error: "Invalid payload",
          details: parsed.error.flatten(),
        });
      }

      const data = parsed.data;
      const result = await withContext(
        { correlationId: createCorrelationId() },
        () => this.service.submit(data)
      );

      if (result === "duplicate") {
        return { status: "ok", note: "duplicate handled & re-notified" };
      }
      return { status: "accepted", note: `processing round ${data.round} started` };
    });
  }

  /** Dispatch a request in process, without a listening socket. */
  inject(options: InjectOptions): Promise<LightMyRequestResponse> {
    return this.app.inject(options);
  }

  async start(port: number, host: string): Promise<void> {
    await this.app.listen({ port, host });
    this.logger.info({ port, host }, "REST API server started");
  }

  async stop(): Promise<void> {
    await this.app.close();
    this.logger.info("REST API server stopped");
  }
}
