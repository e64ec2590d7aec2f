/**
 * Addressing for a resolution: which browser session, page and frame an
 * anchor is looked up in. Owned by the execution layer; the locator only
 * passes it through to strategies.
 */
export interface ExecRoute {
  readonly session: string;
  readonly page: string;
  readonly frame: string;
  readonly mutexKey: string;
}

export function createExecRoute(session: string, page: string, frame: string): ExecRoute {
  return {
    session,
    page,
    frame,
    mutexKey: `frame:${frame}`
  };
}

export function describeRoute(route: ExecRoute): string {
  return `session=${route.session} page=${route.page} frame=${route.frame} mutex=${route.mutexKey}`;
}
