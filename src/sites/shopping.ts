import { css, xpath } from '../browser/selectors'
import type { SiteProfile } from './types'

export const shoppingSite: SiteProfile = {
  name: 'shopping',
  baseUrl: 'https://www.amazon.com',
  loginUrlMarkers: ['ap/signin'],
  checkout: {
    pathMarkers: ['/checkout/p/', '/spc'],
    param: 'pipelineType',
    value: 'chewbacca',
  },
  checkpoint: {
    captchaUrlMarkers: ['validatecaptcha', 'captcha'],
    signinUrlMarkers: ['ap/signin'],
  },
  selectors: {
    COOKIE_ACCEPT: [
      css('#sp-cc-accept'),
      css("input[name='accept']"),
    ],
    POPOVER_CLOSE: [
      css("button[data-action='a-popover-close']"),
      css("button[aria-label='Close']"),
    ],
    SIGNIN_EMAIL: [css('#ap_email')],
    SIGNIN_PASSWORD: [css('#ap_password')],
    RESULTS_READY: [css("div.s-main-slot [data-component-type='s-search-result']")],
    RESULT_LINK: [
      css("[data-component-type='s-search-result'] h2 a.a-link-normal"),
      css("[data-component-type='s-search-result'] img.s-image"),
    ],
    NEXT_PAGE: [css('a.s-pagination-next')],
    SORT_DROPDOWN: [css('span.a-dropdown-container')],
    SORT_PRICE_ASC: [xpath("//a[contains(@href,'s?') and contains(., 'Price: Low to High')]")],
    PRODUCT_PRICE: [
      css('#corePriceDisplay_desktop_feature_div span.a-offscreen'),
      css('#apex_desktop span.a-offscreen'),
      css('span.a-offscreen'),
      css('#priceblock_ourprice'),
      css('#priceblock_dealprice'),
      css('#priceblock_saleprice'),
      css('.reinventPricePriceToPayString'),
    ],
    ADD_TO_CART: [
      css("button[aria-label='Add to cart']"),
      css("button[name='submit.addToCart']"),
      css('input#add-to-cart-button'),
      xpath("//*[@id='add-to-cart-button']"),
    ],
    WARRANTY_DECLINE: [
      css('#attachSiNoCoverage'),
      css("button[aria-labelledby='attachSiNoCoverage-announce']"),
    ],
    SIDESHEET_CLOSE: [css('#attach-close_sideSheet-link')],
    PROCEED_TO_CHECKOUT: [
      css('#attach-sidesheet-checkout-button'),
      css("input[name='proceedToRetailCheckout']"),
      css("a[name='sc-byc-ptc-button']"),
    ],
  },
}

export const CART_PATH = '/gp/cart/view.html?ref_=nav_cart'
