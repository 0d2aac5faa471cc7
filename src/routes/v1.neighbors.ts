/**
 * GET /v1/subjects/:subject/neighbors - Aggregated neighbor set of one subject
 */

import type { FastifyPluginAsync } from "fastify";
import { collectNeighbors } from "../interactions/aggregate.js";
import { NeighborsParams, sortedNames, toSourceStatus, type NeighborsV1 } from "../schemas/interactions.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";
import type { ServiceDeps } from "./types.js";

const neighborsRoute: FastifyPluginAsync<ServiceDeps> = async (app, deps) => {
  app.get("/v1/subjects/:subject/neighbors", async (request, reply) => {
    const parsed = NeighborsParams.safeParse(request.params);
    if (!parsed.success) {
      return reply.code(400).send(zodErrorToErrorV1(parsed.error, getRequestId(request)));
    }

    const aggregation = await collectNeighbors(parsed.data.subject, deps.adapters, {
      timeoutMs: deps.sourceTimeoutMs,
    });

    const body: NeighborsV1 = {
      schema: "neighbors.v1",
      subject: aggregation.subject,
      neighbors: sortedNames(aggregation.neighbors),
      sources: aggregation.sources.map(toSourceStatus),
    };
    return reply.code(200).send(body);
  });
};

export default neighborsRoute;
