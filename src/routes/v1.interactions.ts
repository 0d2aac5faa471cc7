/**
 * POST /v1/interactions - Pairwise interaction report
 *
 * Aggregates both subjects across every enabled source and reports whether
 * they list each other (direct) and which neighbors they share (common).
 * Sets are serialized as sorted arrays. Source failures never fail the
 * request; they show up under `sources`.
 */

import type { FastifyPluginAsync } from "fastify";
import { analyzeInteraction } from "../interactions/report.js";
import { toInteractionGraph } from "../interactions/graph-view.js";
import { InteractionInput, toInteractionReportV1 } from "../schemas/interactions.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";
import type { ServiceDeps } from "./types.js";

const interactionsRoute: FastifyPluginAsync<ServiceDeps> = async (app, deps) => {
  app.post("/v1/interactions", async (request, reply) => {
    const parsed = InteractionInput.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send(zodErrorToErrorV1(parsed.error, getRequestId(request)));
    }

    const { subject_a, subject_b, include_graph } = parsed.data;
    const { report, sourcesA, sourcesB } = await analyzeInteraction(subject_a, subject_b, deps.adapters, {
      timeoutMs: deps.sourceTimeoutMs,
    });

    const graph = include_graph ? toInteractionGraph(report) : undefined;
    return reply.code(200).send(toInteractionReportV1(report, sourcesA, sourcesB, graph));
  });
};

export default interactionsRoute;
