import { css, xpath } from '../browser/selectors'
import type { SiteProfile } from './types'

export const hotelSite: SiteProfile = {
  name: 'hotel',
  baseUrl: 'https://www.booking.com/',
  loginUrlMarkers: ['sign-in', 'signin'],
  selectors: {
    COOKIE_ACCEPT: [
      xpath('//button[.//span[contains(., "Accept")]]'),
      css("button[aria-label*='Accept'][aria-label*='cookie']"),
    ],
    DEST_INPUT: [
      css("input[name='ss']"),
      css("input[placeholder*='Where are you going']"),
      xpath("//input[@name='ss']"),
    ],
    DEST_OPTION: [
      xpath("//ul[@role='listbox']//li[.//div[contains(., {city})] or .//span[contains(., {city})] or .//button[contains(., {city})]]"),
      xpath("//div[@data-testid='autocomplete-results']//button[contains(normalize-space(.), {city})]"),
      xpath("//li[contains(@class,'autocomplete')]//button[contains(normalize-space(.), {city})]"),
      xpath("(//ul[@role='listbox']//li//button)[1]"),
      xpath("(//div[@data-testid='autocomplete-results']//button)[1]"),
    ],
    DATE_FIELD_START: [css("span[data-testid='date-display-field-start']")],
    DATE_FIELD_END: [css("span[data-testid='date-display-field-end']")],
    DATE_CELL: [
      css("span[data-date='{date}']"),
      xpath("//td[@data-date='{date}']"),
    ],
    SEARCH_SUBMIT: [
      css("button[type='submit'][data-testid='searchbox-submit-button']"),
      xpath("//button[contains(., 'Search')]"),
    ],
    GUEST_TOGGLE: [css("[data-testid='occupancy-config'] button")],
    ADULTS_PLUS: [css("button[aria-label*='Increase number of Adults']")],
    ADULTS_MINUS: [css("button[aria-label*='Decrease number of Adults']")],
    ROOMS_PLUS: [css("button[aria-label*='Increase number of Rooms']")],
    FILTER_STARS: [xpath("//*[contains(.,'{stars} stars')]/ancestor::label")],
    FIRST_RESULT_LINK: [
      css("[data-testid='title-link']"),
      xpath("(//a[@data-testid='title-link'])[1]"),
    ],
    RESERVE_CTA: [
      css("span[class='bui-button__text']"),
      xpath('//button[contains(.,"I\'ll reserve") or contains(.,"I’ll reserve")]'),
      xpath('//button[contains(.,"Reserve")]'),
      xpath('//button[contains(.,"Book now") or contains(.,"Continue")]'),
    ],
  },
}
