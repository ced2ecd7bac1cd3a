import { Router } from 'express';

export function createHealthRouter(service: string): Router {
    const router = Router();

    router.get('/', (_req, res) => {
        res.json({ status: 'ok', service });
    });

    return router;
}
