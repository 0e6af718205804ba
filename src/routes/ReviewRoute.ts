import { Router } from "express";
import { ReviewController } from "../controllers/ReviewController";

const router = Router();
const controller = new ReviewController();

router.post("/refund", controller.refund.bind(controller));

export default router;
