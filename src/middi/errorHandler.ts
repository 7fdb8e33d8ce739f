import { NextFunction, Request, Response } from "express";

import { errorMessage, isAppError } from "../helper/appError";

export function sendError(res: Response, err: unknown, tag: string) {
  if (isAppError(err)) {
    if (err.status >= 500) console.error(tag, err.kind, err.message);
    return res
      .status(err.status)
      .json({ status: false, kind: err.kind, message: err.message });
  }
  console.error(tag, err);
  return res
    .status(500)
    .json({ status: false, message: errorMessage(err) || "Server error" });
}

// last middleware: anything thrown past the controllers
export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => sendError(res, err, "UNHANDLED_ERR");
