import {Router} from "express";
import healthRoutes from "./health.routes";
import languageRoutes from "./language.routes";


const router = Router();

router.use("/health", healthRoutes);
router.use("/language", languageRoutes);

export default router;
