import { Router } from "express";
import { ChatController } from "../controllers/ChatController";

const router = Router();
const controller = new ChatController();

router.post("/", controller.message.bind(controller));

export default router;
