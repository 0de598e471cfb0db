declare namespace Express {
  interface Request {
    context: {
      requestId: string;
      startedAt: number;
    };
  }
}
