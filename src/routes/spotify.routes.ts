import { Router } from 'express';
import { SpotifyController } from '../controllers/spotify.controller';
import { authMiddleware } from '../middleware/auth.middleware';
import {
  callbackValidation,
  queueSongValidation,
  recentTracksValidation
} from '../validators/spotify.validators';

const router = Router();

router.get('/auth', authMiddleware, SpotifyController.getAuthUrl);
// Public: the user lands here from Spotify's consent screen
router.get('/callback', callbackValidation, SpotifyController.callback);
router.get('/recent-tracks', authMiddleware, recentTracksValidation, SpotifyController.getRecentTracks);
router.post('/queue-song', authMiddleware, queueSongValidation, SpotifyController.queueSong);

export default router;
