import { ok, err, type Result } from "neverthrow";
import { z } from "zod";
import type { Session } from "../facade/session.js";

const Attributes = z.record(z.unknown());

const ResourceDeclarationSchema = z.object({
  type: z.string().min(1),
  name: z.string().min(1),
  attributes: Attributes.default({}),
});

const DeclarationsSchema = z.object({
  terraform: Attributes.optional(),
  locals: Attributes.optional(),
  provider: z.record(z.union([Attributes, z.array(Attributes)])).optional(),
  variable: z.record(Attributes).optional(),
  output: z.record(Attributes).optional(),
  data: z.record(z.record(Attributes)).optional(),
  resources: z.array(ResourceDeclarationSchema).default([]),
});

export type Declarations = z.infer<typeof DeclarationsSchema>;
export type ResourceDeclaration = z.infer<typeof ResourceDeclarationSchema>;

export const parseDeclarations = (parsed: unknown): Result<Declarations, string> => {
  const result = DeclarationsSchema.safeParse(parsed);
  if (result.success) {
    return ok(result.data);
  }
  const issue = result.error.issues[0];
  const where = issue !== undefined && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
  return err(`${where}${issue?.message ?? "Invalid declarations"}`);
};

/**
 * Replays a declarations file against a session. Resources go through the
 * session's registry; everything else is written as given.
 */
export function applyDeclarations(session: Session, declarations: Declarations): void {
  const { terraform, locals, provider, variable, output, data, resources } = declarations;

  if (terraform !== undefined) session.terraform((b) => b.attributes(terraform));
  if (locals !== undefined) session.locals((b) => b.attributes(locals));

  for (const [name, config] of Object.entries(provider ?? {})) {
    for (const entry of Array.isArray(config) ? config : [config]) {
      session.provider(name, (b) => b.attributes(entry));
    }
  }
  for (const [name, body] of Object.entries(variable ?? {})) {
    session.variable(name, (b) => b.attributes(body));
  }
  for (const [type, byName] of Object.entries(data ?? {})) {
    for (const [name, body] of Object.entries(byName)) {
      session.data(type, name, (b) => b.attributes(body));
    }
  }
  for (const resource of resources) {
    session.declareByName(resource.type, resource.name, resource.attributes);
  }
  for (const [name, body] of Object.entries(output ?? {})) {
    session.output(name, (b) => b.attributes(body));
  }
}
