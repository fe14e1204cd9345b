import { Router } from "express";
import { calculateRate } from "../controllers/rates";

const router = Router();

router.post("/calculate", calculateRate);

export default router;
