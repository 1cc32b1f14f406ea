#!/usr/bin/env tsx
import "dotenv/config";
import * as Sentry from "@sentry/node";
import { authorize } from "./auth";
import { FileCredentialStorage } from "./db/credentials";
import { PlaybackEngine } from "./playback/PlaybackEngine";
import { ApiGateway } from "./services/ApiGateway";
import { LibraryService } from "./services/library-service";
import {
  SpotifyService,
  refreshSpotifyAccessToken,
} from "./services/SpotifyService";
import { TokenStore } from "./services/TokenStore";
import { TerminalUI } from "./ui/terminal";
import { loadConfig } from "./utils/config";
import { describeError } from "./utils/errors";

async function main(): Promise<void> {
  const config = await loadConfig();

  if (config.sentryDsn) {
    Sentry.init({ dsn: config.sentryDsn });
  }

  const tokens = new TokenStore(
    new FileCredentialStorage(config.tokenCachePath),
    (refreshToken) => refreshSpotifyAccessToken(config.clientId, refreshToken),
  );

  // A cached credential skips the browser round trip; a stale one is refreshed on first use
  if (!(await tokens.load())) {
    await authorize(config, tokens);
  }

  const spotify = new SpotifyService(new ApiGateway(tokens));
  const engine = new PlaybackEngine(spotify, tokens, config.engine);
  const ui = new TerminalUI(engine, new LibraryService(spotify), {
    // A revoked session signs in again without leaving the app
    reauthorize: (print) => authorize(config, tokens, print),
  });

  const onSignal = () => ui.close();
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  engine.start();
  try {
    await ui.run();
  } finally {
    engine.shutdown();
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await Sentry.flush(2000);
  }
}

main().then(
  () => process.exit(0),
  (error: unknown) => {
    console.error("playdeck:", describeError(error));
    Sentry.captureException(error);
    void Sentry.flush(2000).finally(() => process.exit(1));
  },
);
