import { Router } from "express";
import { FaqController } from "../controllers/FaqController";

const router = Router();
const controller = new FaqController();

router.post("/ask", controller.ask.bind(controller));
router.get("/stats", controller.stats.bind(controller));

export default router;
