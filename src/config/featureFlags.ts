const processEnv: NodeJS.ProcessEnv = typeof process !== 'undefined' ? process.env : {}

const logDeathsFlag = processEnv.SIM_LOG_DEATHS
const tickTimingsFlag = processEnv.SIM_TICK_TIMINGS

export const parseFlag = (value: string | undefined, fallback = false) =>
  value === undefined ? fallback : value === '1' || value === 'true'

export const featureFlags = {
  logDeaths: parseFlag(logDeathsFlag, false),
  tickTimings: parseFlag(tickTimingsFlag, false),
}
