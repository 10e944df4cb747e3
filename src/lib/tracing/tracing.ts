import ddTrace from 'dd-trace';

export type TracerOptions = NonNullable<Parameters<typeof ddTrace.init>[0]>;

export function tracerOptions(env: NodeJS.ProcessEnv): TracerOptions {
  const options: TracerOptions = {
    service: env.DD_SERVICE || 'gradewise-api',
    env: env.DD_ENV || env.NODE_ENV || 'development',
    version: env.npm_package_version || '1.0.0',
    logInjection: true,
    runtimeMetrics: true,
  };
  // traces go through an agent, which holds the API key; the default is the local one
  if (env.DD_TRACE_AGENT_URL) options.url = env.DD_TRACE_AGENT_URL;
  return options;
}

// The tracer stays a no-op unless explicitly enabled, so workers and tests
// never open a connection to an agent they do not have.
if (process.env.DD_TRACE_ENABLED === 'true') {
  ddTrace.init(tracerOptions(process.env));
}

export default ddTrace;
