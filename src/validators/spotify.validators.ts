import { body, query, ValidationChain } from 'express-validator';
import { SPOTIFY_RECENT_TRACKS_MAX } from '../config/env';

export const callbackValidation: ValidationChain[] = [
    query('code')
        .isString()
        .notEmpty()
        .withMessage('code is required'),

    query('state')
        .isString()
        .notEmpty()
        .withMessage('state is required')
];

export const recentTracksValidation: ValidationChain[] = [
    query('limit')
        .optional()
        .isInt({ min: 1, max: SPOTIFY_RECENT_TRACKS_MAX })
        .withMessage('limit must be an integer between 1 and 50')
        .toInt(),

    query('time_limit_minutes')
        .optional()
        .isInt({ min: 1 })
        .withMessage('time_limit_minutes must be a positive integer')
        .toInt()
];

export const queueSongValidation: ValidationChain[] = [
    body('title')
        .isString()
        .bail()
        .trim()
        .notEmpty()
        .withMessage('title is required'),

    body('artist')
        .isString()
        .bail()
        .trim()
        .notEmpty()
        .withMessage('artist is required')
];
