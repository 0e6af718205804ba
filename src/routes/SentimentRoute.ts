import { Router } from "express";
import { SentimentController } from "../controllers/SentimentController";

const router = Router();
const controller = new SentimentController();

router.post("/predict", controller.predict.bind(controller));

export default router;
