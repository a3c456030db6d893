// API routes: engine reads for any authenticated client, writes for a JWT caller
import { Router, type Response } from 'express';
import { z } from 'zod';

import type { EngineService } from '../bootstrap/buildEngine.js';
import type { InMemoryToken } from '../collaborators/InMemoryToken.js';
import { requireCaller, type AuthRequest } from '../middleware/auth.js';
import { addressesEqual, normalizeAddress } from '../utils/Address.js';

import { sendError } from './errors.js';
import { serializeLiquidation, serializePosition } from './serialize.js';

const uintString = z.string()
  .regex(/^\d+$/, 'expected a decimal integer string')
  .transform(v => BigInt(v));

const depositSchema = z.object({
  asset: z.string().min(1),
  amount: uintString,
  mintAmount: uintString.optional()
});

const redeemSchema = z.object({
  asset: z.string().min(1),
  amount: uintString,
  burnAmount: uintString.optional()
});

const amountSchema = z.object({ amount: uintString });

const liquidationSchema = z.object({
  user: z.string().min(1),
  debtToCover: uintString
});

function callerOf(req: AuthRequest): string {
  if (!req.user) {
    throw new Error('Route mounted without requireCaller');
  }
  return req.user.address;
}

export default function buildRoutes(service: EngineService) {
  const router = Router();
  const { engine } = service;

  const findToken = (id: string): InMemoryToken | undefined => {
    return addressesEqual(id, service.synthetic.id) ? service.synthetic : service.tokens.get(normalizeAddress(id));
  };

  const handle = (res: Response, fn: () => unknown) => {
    try {
      res.json(fn());
    } catch (err) {
      sendError(res, err);
    }
  };

  /**
   * GET /health - Health check endpoint
   */
  router.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'synthetic-usd-engine'
    });
  });

  /**
   * GET /collateral - Registered collateral in configured order
   */
  router.get('/collateral', (_req, res) => {
    handle(res, () => ({
      syntheticToken: engine.syntheticToken().id,
      engineAccount: engine.engineAccount,
      totalDebt: engine.totalDebt().toString(),
      assets: engine.collateralTokens().map(asset => ({
        asset,
        priceFeed: engine.priceFeed(asset).id,
        totalDeposited: engine.totalCollateral(asset).toString()
      }))
    }));
  });

  /**
   * GET /accounts/:user - Debt, collateral and health factor of one position
   */
  router.get('/accounts/:user', (req, res) => {
    handle(res, () => serializePosition(engine.position(req.params.user), engine.minHealthFactor));
  });

  /**
   * GET /positions - Every known position, liquidatable ones flagged
   */
  router.get('/positions', (_req, res) => {
    handle(res, () => {
      const positions = engine.positions().map(p => serializePosition(p, engine.minHealthFactor));
      return { positions, count: positions.length, timestamp: new Date().toISOString() };
    });
  });

  router.get('/price/:asset/usd', (req, res) => {
    handle(res, () => {
      const { amount } = amountSchema.parse(req.query);
      return { asset: normalizeAddress(req.params.asset), amount: amount.toString(), usd: engine.usdValue(req.params.asset, amount).toString() };
    });
  });

  router.get('/price/:asset/tokens', (req, res) => {
    handle(res, () => {
      const { usd } = z.object({ usd: uintString }).parse(req.query);
      return { asset: normalizeAddress(req.params.asset), usd: usd.toString(), amount: engine.tokenAmountFromUsd(req.params.asset, usd).toString() };
    });
  });

  router.get('/tokens/:token/balance/:account', (req, res) => {
    const token = findToken(req.params.token);
    if (!token) {
      return res.status(404).json({ error: `Unknown token ${req.params.token}` });
    }
    return res.json({
      token: token.id,
      account: normalizeAddress(req.params.account),
      balance: token.balanceOf(req.params.account).toString()
    });
  });

  /**
   * POST /tokens/:token/approve - Let the engine pull the caller's tokens
   */
  router.post('/tokens/:token/approve', requireCaller, (req: AuthRequest, res) => {
    const token = findToken(req.params.token);
    if (!token) {
      return res.status(404).json({ error: `Unknown token ${req.params.token}` });
    }
    return handle(res, () => {
      const { amount } = amountSchema.parse(req.body);
      token.approve(callerOf(req), engine.engineAccount, amount);
      return { token: token.id, spender: engine.engineAccount, allowance: amount.toString() };
    });
  });

  router.post('/collateral/deposit', requireCaller, (req: AuthRequest, res) => {
    handle(res, () => {
      const body = depositSchema.parse(req.body);
      const caller = callerOf(req);
      if (body.mintAmount !== undefined) {
        engine.depositCollateralAndMintDebt(caller, body.asset, body.amount, body.mintAmount);
      } else {
        engine.depositCollateral(caller, body.asset, body.amount);
      }
      return serializePosition(engine.position(caller), engine.minHealthFactor);
    });
  });

  router.post('/collateral/redeem', requireCaller, (req: AuthRequest, res) => {
    handle(res, () => {
      const body = redeemSchema.parse(req.body);
      const caller = callerOf(req);
      if (body.burnAmount !== undefined) {
        engine.redeemCollateralForDebt(caller, body.asset, body.amount, body.burnAmount);
      } else {
        engine.redeemCollateral(caller, body.asset, body.amount);
      }
      return serializePosition(engine.position(caller), engine.minHealthFactor);
    });
  });

  router.post('/debt/mint', requireCaller, (req: AuthRequest, res) => {
    handle(res, () => {
      const { amount } = amountSchema.parse(req.body);
      const caller = callerOf(req);
      engine.mintDebt(caller, amount);
      return serializePosition(engine.position(caller), engine.minHealthFactor);
    });
  });

  router.post('/debt/burn', requireCaller, (req: AuthRequest, res) => {
    handle(res, () => {
      const { amount } = amountSchema.parse(req.body);
      const caller = callerOf(req);
      engine.burnDebt(caller, amount);
      return serializePosition(engine.position(caller), engine.minHealthFactor);
    });
  });

  /**
   * POST /liquidations - Cover part of an unhealthy position's debt
   */
  router.post('/liquidations', requireCaller, (req: AuthRequest, res) => {
    handle(res, () => {
      const body = liquidationSchema.parse(req.body);
      return serializeLiquidation(engine.liquidate(callerOf(req), body.user, body.debtToCover));
    });
  });

  return router;
}
