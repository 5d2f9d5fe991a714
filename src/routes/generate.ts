import { Router } from "express";
import {
  getGenerateController,
  postGenerateController,
} from "../controllers/generateController";
import { generateLimiter } from "../middlewares/rateLimiters";

const router = Router();

router.get("/", generateLimiter, getGenerateController);
router.post("/", generateLimiter, postGenerateController);

export default router;
