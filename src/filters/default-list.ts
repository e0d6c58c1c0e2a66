export const DEFAULT_FILTER_LIST_NAME = 'default';

// Kept conservative: generic selectors exclude common site-owned classes
export const DEFAULT_FILTER_LIST = `! Built-in default list
||doubleclick.net/gampad/
||googleadservices.com/pagead/
||googlesyndication.com/pagead/
||amazon-adsystem.com/aax2/
||facebook.com/tr^
||twitter.com/i/analytics^
##.ad:not(.youtube-ad)
##.ads:not(.content-ads)
##.advertisement:not(.site-content)
##.advert:not(.article-advert)
##.banner-ad:not(.site-banner)
##.popup-ad
##div[id*="google_ads"]:not([id*="youtube"])
`;
