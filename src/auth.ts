import { randomBytes } from "node:crypto";
import { serve } from "@hono/node-server";
import { createCallbackApp } from "./api/callback";
import type { TokenStore } from "./services/TokenStore";
import {
  buildAuthorizeUrl,
  exchangeSpotifyAuthorizationCode,
} from "./services/SpotifyService";
import {
  deriveCodeChallenge,
  generateCodeVerifier,
  generateOAuthState,
} from "./utils/auth";
import type { AppConfig } from "./utils/config";

const AUTHORIZE_TIMEOUT_MS = 5 * 60 * 1000;

/**
 * Runs the PKCE authorization-code flow: prints the authorize URL, waits for
 * the browser to hit the local callback, then exchanges the code and hands
 * the credential to the token store.
 */
export async function authorize(
  config: Pick<AppConfig, "clientId" | "redirectUri">,
  tokens: Pick<TokenStore, "authorize">,
  print: (line: string) => void = console.log,
): Promise<void> {
  const redirect = new URL(config.redirectUri);
  const stateSecret = randomBytes(32).toString("hex");
  const codeVerifier = generateCodeVerifier();
  const state = await generateOAuthState(stateSecret);

  const code = await new Promise<string>((resolve, reject) => {
    const app = createCallbackApp({
      stateSecret,
      onCode: (value) => finish(() => resolve(value)),
      onError: (error) => finish(() => reject(error)),
    });

    const server = serve(
      {
        fetch: app.fetch,
        hostname: redirect.hostname,
        port: Number(redirect.port || 80),
      },
      () => {
        deriveCodeChallenge(codeVerifier).then(
          (codeChallenge) => {
            print("Open this URL in a browser to connect Spotify:");
            print(
              buildAuthorizeUrl({
                clientId: config.clientId,
                redirectUri: config.redirectUri,
                state,
                codeChallenge,
              }),
            );
          },
          (error: unknown) => finish(() => reject(error)),
        );
      },
    );

    const timeout = setTimeout(() => {
      finish(() => reject(new Error("Timed out waiting for Spotify authorization")));
    }, AUTHORIZE_TIMEOUT_MS);

    function finish(settle: () => void): void {
      clearTimeout(timeout);
      server.close();
      settle();
    }
  });

  const credential = await exchangeSpotifyAuthorizationCode({
    clientId: config.clientId,
    code,
    redirectUri: config.redirectUri,
    codeVerifier,
  });
  await tokens.authorize(credential);
  print("Spotify connected.");
}
