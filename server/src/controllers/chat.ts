import { Request, Response, NextFunction, RequestHandler } from "express";
import { initChatSchema, chatMessageSchema } from "../validation/house";
import type { PlanningChat } from "../services/chat";

export function chatController(chat: PlanningChat): Record<"init" | "message", RequestHandler> {
  return {
    // POST /chat/init — start a planning conversation
    async init(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const body = initChatSchema.parse(req.body ?? {});
        const result = await chat.start(body);
        res.status(201).json({ success: true, data: result });
      } catch (err) {
        next(err);
      }
    },

    // POST /chat/message — one user turn, one assistant reply
    async message(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { sessionId, message } = chatMessageSchema.parse(req.body);
        const reply = await chat.send(sessionId, message);
        res.json({ success: true, data: reply });
      } catch (err) {
        next(err);
      }
    },
  };
}
