import type { HttpTarget, ProbeReport, TcpTarget } from '../core/types'
import { probeHttp } from './http'
import { probeTcp } from './tcp'

export { probeTcp, DEFAULT_TCP_TIMEOUT_MS, type TcpProbeOptions } from './tcp'
export { probeHttp, planHttpRequest, DEFAULT_HTTP_TIMEOUT_MS, USER_AGENT, type HttpProbeOptions, type HttpRequestPlan } from './http'

// One prober per target kind; the runner dispatches on `kind`
export interface ProberSet {
  tcp: (target: TcpTarget) => Promise<ProbeReport>
  http: (target: HttpTarget) => Promise<ProbeReport>
}

export function createDefaultProbers(): ProberSet {
  return {
    tcp: (target) => probeTcp(target.address),
    http: (target) => probeHttp(target),
  }
}
