import express, { type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import {
  DEFAULT_METRIC_WEIGHT, DEFAULT_PRESET, DEFAULT_TOP_N, METRICS, PRESETS, THEME_GROUPS, TOP_N_CHOICES,
} from '../services/catalog.ts';
import { EXPORT_FILE_NAME, exportScoredCsv } from '../services/export.ts';
import { DEFAULT_FINANCING, DEFAULT_MAX_INVESTMENT } from '../services/finance.ts';
import { buildInvestorNarrative, pickNarrativeWinners } from '../services/narrative.ts';
import { runScoringPass } from '../services/pipeline.ts';
import { buildRankedTable, compareMarkets, topMarkets } from '../services/ranking.ts';
import { getDataset } from '../services/state.ts';
import { CompareRequestSchema, ScoreRequestSchema, toScoringInputs, type ScoreRequest } from '../schemas.ts';
import type { ScoringPass } from '../types.ts';

export interface MarketRouterOptions {
  renovationBuffer: number;
}

// ── Zod validation ──

/** Parse the request body, or answer 400 and return null. */
function validate<T extends z.ZodTypeAny>(schema: T, req: Request, res: Response): z.infer<T> | null {
  const result = schema.safeParse(req.body ?? {});
  if (!result.success) {
    const errors = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    res.status(400).json({ success: false, error: 'Validation failed', details: errors });
    return null;
  }
  return result.data;
}

export function marketRoutes(opts: MarketRouterOptions) {
  const router = express.Router();

  const score = (body: ScoreRequest): ScoringPass =>
    runScoringPass(getDataset().markets, toScoringInputs(body, opts.renovationBuffer));

  /**
   * GET /catalog — groups, metrics, presets and slider defaults
   */
  router.get('/catalog', (_req: Request, res: Response) => {
    res.json({
      success: true,
      data: {
        groups: THEME_GROUPS,
        metrics: METRICS.map(({ id, column, label, description, group, direction }) =>
          ({ id, column, label, description, group, direction })),
        presets: PRESETS,
        defaults: {
          preset: DEFAULT_PRESET,
          metricWeight: DEFAULT_METRIC_WEIGHT,
          topN: DEFAULT_TOP_N,
          assumptions: DEFAULT_FINANCING,
          maxInvestment: DEFAULT_MAX_INVESTMENT,
          renovationBuffer: opts.renovationBuffer,
        },
        topNChoices: TOP_N_CHOICES,
      },
    });
  });

  /**
   * POST /score — ranked table (top N) for the given assumptions and weights
   */
  router.post('/score', (req: Request, res: Response, next: NextFunction) => {
    const body = validate(ScoreRequestSchema, req, res);
    if (!body) return;
    try {
      const pass = score(body);
      res.json({
        success: true,
        data: {
          weights: pass.weights,
          groupWeights: pass.groupWeights,
          totalMarkets: pass.totalMarkets,
          excludedMarkets: pass.excludedMarkets,
          rankedMarkets: pass.ranked.length,
          rows: buildRankedTable(topMarkets(pass.ranked, body.topN), pass.weights),
        },
      });
    } catch (err) { next(err); }
  });

  /**
   * POST /compare — side-by-side table for two markets
   */
  router.post('/compare', (req: Request, res: Response, next: NextFunction) => {
    const body = validate(CompareRequestSchema, req, res);
    if (!body) return;
    try {
      const pass = score(body);
      const { a, b, rows } = compareMarkets(pass.ranked, pass.weights, body.marketA, body.marketB);
      res.json({
        success: true,
        data: {
          markets: [
            { name: a.name, state: a.state, rank: a.rank, financials: a.financials },
            { name: b.name, state: b.state, rank: b.rank, financials: b.financials },
          ],
          rows,
        },
      });
    } catch (err) { next(err); }
  });

  /**
   * POST /compare/narrative — investor write-up for two markets
   */
  router.post('/compare/narrative', (req: Request, res: Response, next: NextFunction) => {
    const body = validate(CompareRequestSchema, req, res);
    if (!body) return;
    try {
      const pass = score(body);
      const { a, b } = compareMarkets(pass.ranked, pass.weights, body.marketA, body.marketB);
      const picks = pickNarrativeWinners(a, b);
      res.json({
        success: true,
        data: {
          shortTermUpside: picks.shortTermUpside.name,
          longTermSafety: picks.longTermSafety.name,
          text: buildInvestorNarrative(a, b),
        },
      });
    } catch (err) { next(err); }
  });

  /**
   * POST /export — full scored table as a CSV download
   */
  router.post('/export', (req: Request, res: Response, next: NextFunction) => {
    const body = validate(ScoreRequestSchema, req, res);
    if (!body) return;
    try {
      const pass = score(body);
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="${EXPORT_FILE_NAME}"`);
      res.send(exportScoredCsv(pass.ranked, pass.weights));
    } catch (err) { next(err); }
  });

  return router;
}
