import { WELCOME_PAYLOAD } from "@slidetext/utils";
import type { ApiContext } from "../context.js";

export async function getWelcome(_request: Request, _ctx: ApiContext) {
  return Response.json(WELCOME_PAYLOAD);
}
