/** Package and extension route handlers: /api/packages/* */

import { Router, type Response } from 'express';
import type { PackageStore } from '../services/extensions/packageStore.js';
import { PackageModificationRunner } from '../services/packageModification/packageModificationRunner.js';
import {
  InstallExtensionStep,
  UninstallExtensionStep,
  type PackageStep,
} from '../services/packageModification/packageStep.js';
import type { ExtensionManager } from '../services/extensions/extensionManager.js';
import { PackageNotFoundError } from '../services/extensions/errors.js';
import type { PackagePair } from '../models/package.js';
import type { SendEvent } from '../models/events.js';
import { InstallRequestSchema, UninstallRequestSchema, validationFailure } from '../utils/requestSchemas.js';
import { Logger } from '../utils/logger.js';

interface ExtensionRouterDeps {
  packages: PackageStore;
  send: SendEvent;
  logger?: Logger;
}

export function createExtensionRouter({ packages, send, logger }: ExtensionRouterDeps): Router {
  const router = Router();

  /** Resolve the package and its extension manager, answering 404/501 itself when it can't. */
  function resolveManager(id: string, res: Response): { pair: PackagePair; manager: ExtensionManager } | null {
    let pair: PackagePair;
    try {
      pair = packages.getPair(id);
    } catch (err) {
      if (!(err instanceof PackageNotFoundError)) throw err;
      res.status(404).json({ detail: err.message });
      return null;
    }
    const manager = pair.basePackage.extensionManager;
    if (!manager) {
      res.status(501).json({ detail: `${pair.basePackage.displayName} does not support extensions` });
      return null;
    }
    return { pair, manager };
  }

  async function runSteps(packageId: string, steps: PackageStep[], res: Response): Promise<void> {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });
    const runner = new PackageModificationRunner({ packageId, send, logger });
    const result = await runner.executeSteps(steps, controller.signal);
    res.json({
      runner_id: result.runnerId,
      failed: result.failed,
      completed_steps: result.completedSteps,
      errors: result.errors,
    });
  }

  router.get('/', (_req, res) => {
    res.json(packages.list().map((pkg) => ({
      ...pkg,
      supportsExtensions: packages.getBasePackage(pkg.packageName)?.extensionManager !== undefined,
    })));
  });

  router.get('/:id/extensions', async (req, res) => {
    const resolved = resolveManager(req.params.id, res);
    if (!resolved) return;
    const { pair, manager } = resolved;

    const [available, installed] = await Promise.all([
      manager.getManifestExtensions(manager.getManifests(pair.installedPackage)),
      manager.getInstalledExtensions(pair.installedPackage),
    ]);
    res.json({ available, installed });
  });

  router.post('/:id/extensions/install', async (req, res) => {
    const parsed = InstallRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(validationFailure('Invalid install request', parsed.error));
      return;
    }
    const resolved = resolveManager(req.params.id, res);
    if (!resolved) return;
    const { pair, manager } = resolved;

    const steps = parsed.data.extensions.map(
      (ext) => new InstallExtensionStep(manager, pair.installedPackage, ext),
    );
    await runSteps(req.params.id, steps, res);
  });

  router.post('/:id/extensions/uninstall', async (req, res) => {
    const parsed = UninstallRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(validationFailure('Invalid uninstall request', parsed.error));
      return;
    }
    const resolved = resolveManager(req.params.id, res);
    if (!resolved) return;
    const { pair, manager } = resolved;

    const steps = parsed.data.extensions.map(
      (ext) => new UninstallExtensionStep(manager, pair.installedPackage, ext),
    );
    await runSteps(req.params.id, steps, res);
  });

  return router;
}
