import { Hono } from "hono";
import { verifyOAuthState } from "../utils/auth";

export interface CallbackHandlers {
  /** Secret the outgoing `state` was signed with */
  stateSecret: string;
  onCode(code: string): void;
  onError(error: Error): void;
}

/**
 * Local redirect target for the authorization-code flow. Only the first
 * valid callback is delivered; later ones are told the flow is over.
 */
export function createCallbackApp(handlers: CallbackHandlers): Hono {
  const app = new Hono();
  let completed = false;

  app.get("/callback", async (c) => {
    if (completed) {
      return c.text("Authorization already completed", 409);
    }

    const code = c.req.query("code");
    const state = c.req.query("state");
    const errorParam = c.req.query("error");

    if (errorParam) {
      console.error("Spotify returned an error", errorParam);
      completed = true;
      handlers.onError(new Error(`Spotify authorization failed: ${errorParam}`));
      return c.text("Spotify authorization failed", 400);
    }

    if (!code || !state) {
      return c.text("Missing OAuth parameters", 400);
    }

    try {
      await verifyOAuthState(handlers.stateSecret, state);
    } catch (error) {
      console.error("Failed to verify Spotify OAuth state", error);
      return c.text("Invalid OAuth state", 400);
    }

    completed = true;
    handlers.onCode(code);
    return c.text("Spotify connected. You can close this tab.");
  });

  return app;
}
