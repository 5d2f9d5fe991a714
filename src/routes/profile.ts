import { Router } from "express";
import {
  getProfileController,
  rebuildProfileController,
} from "../controllers/profileController";
import { rebuildLimiter } from "../middlewares/rateLimiters";

const router = Router();

router.get("/", getProfileController);
router.post("/rebuild", rebuildLimiter, rebuildProfileController);

export default router;
