// src/routes/rankings.ts
import { Router } from "express";
import type { RankingsService } from "../modules/rankings/rankings.service";
import type { RankingsRequestDto } from "../modules/rankings/rankings.types";
import { parseNumber, parseQueryString } from "../utils/validators";

/**
 * Query-string contracts (GET), snake_case response:
 *  - GET /api/v1/rankings?country=&achievement_type=&limit=  → { rows, total, truncated }
 *  - GET /api/v1/rankings/countries                          → { countries }
 *  - GET /api/v1/rankings/achievement-types                  → { achievement_types }
 *  - GET /api/v1/rankings/filters                            → FilterOptionsDto
 *  - GET /api/v1/rankings/layout                             → TableLayoutDto
 */
export default function rankingsRoutes(svc: RankingsService) {
    const router = Router();

    router.get("/", (req, res, next) => {
        try {
            const dto: RankingsRequestDto = {
                country: parseQueryString(req.query.country, "country"),
                achievement_type: parseQueryString(req.query.achievement_type, "achievement_type"),
                limit: parseNumber(parseQueryString(req.query.limit, "limit")),
            };
            res.json(svc.renderTable(dto));
        } catch (err) {
            next(err);
        }
    });

    router.get("/countries", (_req, res) => {
        res.json({ countries: svc.filterOptions().countries });
    });

    router.get("/achievement-types", (_req, res) => {
        res.json({ achievement_types: svc.filterOptions().achievement_types });
    });

    router.get("/filters", (_req, res) => {
        res.json(svc.filterOptions());
    });

    router.get("/layout", (_req, res) => {
        res.json(svc.layout());
    });

    return router;
}
