/**
 * Context assembly routes
 *
 * POST /v1/context          - assemble caller-supplied sections under a budget
 * POST /v1/context/subjects - collect sections for subjects, then assemble
 *
 * Both answer with context-bundle.v1. A bad budget, priority or duplicate
 * label is a 400; a tokenizer failure is a 500 TOKENIZER_FAILURE.
 */

import type { FastifyPluginAsync } from "fastify";
import { assembleContext, validateMaxTokens } from "../context/assembler.js";
import { createSection } from "../context/sections.js";
import { collectSubjectContext } from "../context/subject-context.js";
import { ContextInput, SubjectContextInput, toContextBundleV1 } from "../schemas/context.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";
import type { ServiceDeps } from "./types.js";

const contextRoute: FastifyPluginAsync<ServiceDeps> = async (app, deps) => {
  app.post("/v1/context", async (request, reply) => {
    const parsed = ContextInput.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send(zodErrorToErrorV1(parsed.error, getRequestId(request)));
    }

    const maxTokens = parsed.data.max_tokens ?? deps.defaultMaxTokens;
    const sections = parsed.data.sections.map((section) =>
      createSection(section.label, section.value, section.priority),
    );

    const bundle = assembleContext(sections, maxTokens, deps.tokenizer);
    return reply.code(200).send(toContextBundleV1(bundle));
  });

  app.post("/v1/context/subjects", async (request, reply) => {
    const parsed = SubjectContextInput.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send(zodErrorToErrorV1(parsed.error, getRequestId(request)));
    }

    const maxTokens = parsed.data.max_tokens ?? deps.defaultMaxTokens;
    // Reject a bad budget before any source is queried
    validateMaxTokens(maxTokens);

    const collected = await collectSubjectContext(parsed.data.subjects, {
      adapters: deps.adapters,
      articles: deps.articles,
      timeoutMs: deps.sourceTimeoutMs,
    });

    const bundle = assembleContext(collected.sections, maxTokens, deps.tokenizer);
    return reply.code(200).send(toContextBundleV1(bundle));
  });
};

export default contextRoute;
