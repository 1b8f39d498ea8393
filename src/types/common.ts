export interface RequestContext {
  requestId: string;
  startTime: number;
}

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      context: RequestContext;
    }
  }
}

export interface HealthResponse {
  status: "ok";
  version: string;
  uptime: number;
  backend: {
    baseUrl: string;
    apiType: string;
  };
}
