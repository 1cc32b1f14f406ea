export {};

declare global {
  namespace NodeJS {
    interface ProcessEnv {
      SPOTIFY_CLIENT_ID?: string;
      SPOTIFY_REDIRECT_URI?: string;
      PLAYDECK_CONFIG_DIR?: string;
      XDG_CONFIG_HOME?: string;
      SENTRY_DSN?: string;
    }
  }
}
