export const LIST_API = 'https://api.encar.com/search/car/list/general';
export const SESSION_URL = 'https://www.encar.com/';
export const LISTING_URL = 'https://fem.encar.com/cars/detail';

export const FETCH_HEADERS = {
    Accept: 'application/json, text/plain, */*',
    'Accept-Language': 'ko-KR,ko;q=0.9,en-US;q=0.8,en;q=0.7',
    Referer: 'https://www.encar.com/',
    Origin: 'https://www.encar.com',
};

export const DAY_MS = 86_400_000;
export const MINUTE_MS = 60_000;

export const COUPE_MARKERS = ['쿠페', 'coupe'];

// Lease vocabulary: page must contain one of these before any lease field is extracted.
export const LEASE_MARKERS = [
    '월리스료',
    '월렌트료',
    '월납입금',
    '월 납입금',
    '리스료',
    '렌트료',
    '인수금',
    '보증금',
    '리스 만기',
    '잔존가치',
    '리스승계',
];

export const CLOSURE_REGION_SELECTOR = '[class*="DetailNone"], [class*="no_data"]';
export const CLOSURE_REGION_PHRASES = ['판매되었거나 삭제된', '판매완료'];

export const ERROR_TITLE_MARKERS = [
    '404',
    'not found',
    'page not found',
    'error',
    '페이지를 찾을 수 없습니다',
    '존재하지 않는',
    '오류',
];

export const WITHDRAWN_PHRASES = [
    '이 차량은 판매되었거나 삭제된 차량입니다',
    '차량정보가 존재하지 않습니다',
    '해당 매물을 찾을 수 없습니다',
    '삭제되었거나 존재하지 않는',
    '판매가 완료된 차량',
];

// Only the first match of each selector counts; later matches are often form validation messages.
export const ERROR_ELEMENT_SELECTORS = [
    '.error-page',
    '.not-found-page',
    '[class*="error"]',
    '[class*="notfound"]',
    '[class*="404"]',
];
export const ERROR_ELEMENT_MIN_TEXT = 10;
export const ERROR_URL_PATTERN = /error|404|notfound/i;

// Rendered-page widgets that reveal view count and registration date once clicked.
export const DETAIL_EXPANDERS = ['[class*="DetailSummary_btn_detail"]', 'button:has-text("조회수 자세히보기")'];
