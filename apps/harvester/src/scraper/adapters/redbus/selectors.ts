/**
 * redBus CSS Selectors
 *
 * Search results render as a list of bus cards. Reviews for a bus open in a
 * modal from the card's rating section; page preparation copies the modal's
 * contents into the card before parsing.
 * Where two selectors are listed, the first is the current layout and the
 * second the older one.
 */

export const SELECTORS = {
  // Results list (absent on error/blocked pages)
  listingContainer: 'ul.bus-items, .bus-items',

  // One bus per card
  busCard: '.bus-item',

  // Inside a bus card
  operator: '.travels .name, .travels',
  busName: '.bus-name',
  busType: '.bus-type, .busType',
  route: '.route-info, .route',
  departureTime: '.dp-time',
  rating: '.rating-sec .rating',
  ratingCount: '.rating-sec .votes',

  // Inside a bus card (or its copied review modal)
  reviewCard: '.review-card',

  // Review modal
  reviewTrigger: '.rating-sec',
  reviewModal: '.review-modal',
  reviewModalClose: '.review-modal .close',

  // Inside a review card
  reviewRating: '.rating, .score',
  reviewTitle: '.title',
  reviewBody: '.comment, .desc',
  reviewDate: '.review-date, .date',

  // Terminal pages
  endOfResults: '.no-more-results, .oops-page, .no-bus-found',
  challenge: '#captcha, .g-recaptcha, iframe[src*="captcha"], .cf-challenge',
} as const

/**
 * Body text that marks a challenge page when no challenge element is present.
 */
export const CHALLENGE_PHRASES = ['verify you are human', 'access denied', 'unusual traffic'] as const

export const END_OF_RESULTS_PHRASES = ['no buses found'] as const
