import { Router } from 'express';
import authRoutes from './auth.routes';
import userRoutes from './user.routes';
import spotifyRoutes from './spotify.routes';
import moodRoutes from './mood.routes';
import recommendationRoutes from './recommendation.routes';

const router = Router();

// Mount all routes
router.use('/auth', authRoutes);
router.use('/users', userRoutes);
router.use('/spotify', spotifyRoutes);
router.use('/mood', moodRoutes);
router.use('/recommendations', recommendationRoutes);

export default router;
