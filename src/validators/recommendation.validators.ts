import { buildCheckFunction, query, ValidationChain } from 'express-validator';
import { SPOTIFY_RECENT_TRACKS_MAX } from '../config/env';
import { MOOD_DIMENSIONS } from '../types/mood.types';

export const analyzeRecentTracksValidation: ValidationChain[] = [
    query('limit')
        .optional()
        .isInt({ min: 1, max: SPOTIFY_RECENT_TRACKS_MAX })
        .withMessage('limit must be an integer between 1 and 50')
        .toInt()
];

export const getRecommendationsValidation: ValidationChain[] = [
    query('limit')
        .optional()
        .isInt({ min: 1, max: 10 })
        .withMessage('limit must be an integer between 1 and 10')
        .toInt(),

    query('use_current_mood')
        .optional()
        .isBoolean()
        .withMessage('use_current_mood must be true or false')
        .toBoolean(),

    ...MOOD_DIMENSIONS.map((dimension) =>
        query(dimension)
            .optional()
            .isFloat({ min: 0, max: 1 })
            .withMessage(`${dimension} must be a number between 0 and 1`)
            .toFloat()
    ),

    // A mood override has to be complete
    query().custom((params: Record<string, unknown>) => {
        const provided = MOOD_DIMENSIONS.filter((dimension) => params[dimension] !== undefined);
        if (provided.length > 0 && provided.length < MOOD_DIMENSIONS.length) {
            throw new Error('When overriding the mood, happy, sad, angry and relaxed must all be provided');
        }
        if (provided.length === 0 && String(params.use_current_mood) === 'false') {
            throw new Error('When not using current mood, happy, sad, angry and relaxed must all be provided');
        }
        return true;
    })
];

// Older clients send the id as a query parameter
const bodyOrQuery = buildCheckFunction(['body', 'query']);

export const queueTrackValidation: ValidationChain[] = [
    bodyOrQuery('track_id')
        .isString()
        .withMessage('track_id is required')
        .bail()
        .trim()
        .matches(/^[A-Za-z0-9]{22}$/)
        .withMessage('track_id must be a Spotify track id')
];
