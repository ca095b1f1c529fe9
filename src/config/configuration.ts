import { loadEnvironment } from './environment';

const configuration = () => {
  const env = loadEnvironment();

  return {
    app: {
      env: env.nodeEnv,
    },
    logger: {
      level: env.logLevel,
      pretty: env.logPretty,
    },
    tetraChannel: {
      baseUrl: env.tetraChannelBaseUrl,
      sessionId: env.tetraChannelSessionId.length
        ? env.tetraChannelSessionId
        : null,
      userAgent: env.tetraChannelUserAgent,
      rankPrecedence: env.tetraChannelRankPrecedence,
    },
  };
};

export type AppConfiguration = ReturnType<typeof configuration>;
export type TetraChannelConfig = AppConfiguration['tetraChannel'];

export default configuration;
