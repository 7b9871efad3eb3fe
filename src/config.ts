export type AppConfig = {
  mountElementId: string;
  ctaButtonClassName: string;
};

export const DEFAULT_APP_CONFIG: AppConfig = {
  mountElementId: 'app',
  ctaButtonClassName: 'cta-button',
};

export const appConfig: Readonly<AppConfig> = Object.freeze({ ...DEFAULT_APP_CONFIG });
