import { Router, Request, Response } from "express";
import { listOpportunityTypes } from "../services/taxonomy";

const router = Router();

/**
 * GET /opportunity-types
 * Labels the analyzer can assign
 */
router.get("/", (_req: Request, res: Response) => {
  res.json({ types: listOpportunityTypes() });
});

export default router;
