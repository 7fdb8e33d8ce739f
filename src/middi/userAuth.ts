// src/middi/userAuth.ts
import { Request, Response, NextFunction } from "express";

import { AppError, ErrorKind } from "../helper/appError";

export interface UserRequest extends Request {
  userId?: string;
}

/**
 * Users are identified by an opaque id, sent as the x-user-id header or the
 * user_id query parameter. Authenticating that id is left to the gateway in
 * front of this service.
 */
export const requireUserId = (
  req: UserRequest,
  res: Response,
  next: NextFunction
) => {
  const header = req.headers["x-user-id"];
  const fromQuery =
    typeof req.query.user_id === "string" ? req.query.user_id : undefined;
  const userId = (typeof header === "string" ? header : fromQuery)?.trim();

  if (!userId) {
    return res
      .status(401)
      .json({ status: false, message: "User id required (x-user-id header)" });
  }

  req.userId = userId;
  next();
};

export function userIdOf(req: UserRequest): string {
  if (!req.userId) {
    throw new AppError(ErrorKind.InvalidInput, "user id required");
  }
  return req.userId;
}
