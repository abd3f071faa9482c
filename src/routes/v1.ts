// src/routes/v1.ts
import { Router } from "express";

import type { RankingsService } from "../modules/rankings/rankings.service";
import rankingsRoutes from "./rankings";

export interface V1Deps {
    rankings: RankingsService;
}

export default function v1Routes(deps: V1Deps) {
    const v1 = Router();

    v1.get("/health", (_req, res) => res.json({ ok: true }));

    v1.use("/rankings", rankingsRoutes(deps.rankings));

    return v1;
}
