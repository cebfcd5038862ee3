// Request fields populated by this service's middleware.
declare module 'express-serve-static-core' {
  interface Request {
    id?: string;
    startTime?: number;
    accessToken?: string;
  }
}

export {};
