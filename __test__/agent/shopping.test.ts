import { describe, expect, it } from 'vitest'
import { ScriptedPlanner } from '../../src/agent/planner'
import { STOPPED_ON_CHECKOUT } from '../../src/agent/registry'
import { TASKS } from '../../src/agent/tasks'
import { withPriceCap } from '../../src/agent/tools/shopping'
import type { Pages } from '../helpers/dom-driver'
import { harness } from '../helpers/context'

const HOME = 'https://www.amazon.com/'
const SEARCH = 'https://www.amazon.com/s?k=usb+cable'
const CAPPED = 'https://www.amazon.com/s?k=usb+cable&rh=p_36%3A-2500'
const PRODUCT = 'https://www.amazon.com/dp/B1'
const CART = 'https://www.amazon.com/gp/cart/view.html?ref_=nav_cart'
const CHECKOUT = 'https://www.amazon.com/checkout/p/p-1/spc?pipelineType=chewbacca'
const SIGNIN = 'https://www.amazon.com/ap/signin?return_to=checkout'

const RESULTS = `<div class="s-main-slot">
  <div data-component-type="s-search-result">
    <h2><a class="a-link-normal" href="/dp/B1" data-nav="${PRODUCT}">USB cable</a></h2>
  </div>
</div>`

function product(price: string, checkoutTarget = CHECKOUT): string {
  return `<div id="corePriceDisplay_desktop_feature_div"><span class="a-offscreen">${price}</span></div>
    <button name="submit.addToCart" id="add-btn">Add to cart</button>
    <a id="attach-sidesheet-checkout-button" data-nav="${checkoutTarget}">Proceed to checkout</a>`
}

describe('withPriceCap', () => {
  it('adds the cap in cents', () => {
    expect(withPriceCap(SEARCH, 25)).toBe(CAPPED)
    expect(withPriceCap(SEARCH, 19.99)).toBe('https://www.amazon.com/s?k=usb+cable&rh=p_36%3A-1999')
  })
})

describe('shopping task', () => {
  it('runs from search to the checkout stop', async () => {
    const pages: Pages = { [SEARCH]: RESULTS, [CAPPED]: RESULTS, [PRODUCT]: product('$19.99') }
    const { runtime, driver, session } = harness(TASKS.shopping, pages, HOME)
    const script = TASKS.shopping.script({ query: 'usb cable', maxPrice: 25 })
    const result = await runtime.run(new ScriptedPlanner(script))

    expect(result.outcome).toBe('succeeded')
    expect(result.steps.map((s) => s.result)).toEqual([
      'results_opened:usb cable:cap=25.0',
      'product_opened',
      'price=19.99; verdict=Allowed',
      'ADDED',
      STOPPED_ON_CHECKOUT,
    ])
    expect(driver.clicks.map((c) => c.id)).toEqual(['a', 'add-btn', 'attach-sidesheet-checkout-button'])
    expect(session.state).toBe('terminated')
  })

  it('opens uncapped results', async () => {
    const { runtime, driver } = harness(TASKS.shopping, { [SEARCH]: RESULTS }, HOME)
    expect(await runtime.registry.invoke('shop_open_results', { query: 'usb cable' })).toBe('results_opened:usb cable:cap=none')
    expect(driver.url()).toBe(SEARCH)
  })

  it('reports a sign-in wall on the results page', async () => {
    const { runtime } = harness(TASKS.shopping, { [SEARCH]: '<input id="ap_email">' }, HOME)
    expect(await runtime.registry.invoke('shop_open_results', { query: 'usb cable' })).toBe('blocked:signin')
  })

  it('reads the price against the configured or given ceiling', async () => {
    const { runtime } = harness(TASKS.shopping, { [PRODUCT]: product('$19.99') }, PRODUCT)
    expect(await runtime.registry.invoke('shop_product_price')).toBe('price=19.99; verdict=Allowed')
    expect(await runtime.registry.invoke('shop_product_price', { max_price: 10 })).toBe('price=19.99; verdict=Blocked(exceeds limit)')

    const expensive = harness(TASKS.shopping, { [PRODUCT]: product('$250.00') }, PRODUCT)
    expect(await expensive.runtime.registry.invoke('shop_product_price')).toBe('price=250.0; verdict=Blocked(exceeds limit)')

    const unpriced = harness(TASKS.shopping, { [PRODUCT]: '<h1>Item</h1>' }, PRODUCT)
    expect(await unpriced.runtime.registry.invoke('shop_product_price')).toBe('price=unknown; verdict=Blocked(price unknown)')
  })

  it('refuses to add an item above the ceiling', async () => {
    const { runtime, driver } = harness(TASKS.shopping, { [PRODUCT]: product('$250.00') }, PRODUCT)
    expect(await runtime.registry.invoke('shop_add_to_cart')).toBe('BLOCKED(exceeds limit)')
    expect(driver.clicks).toEqual([])
  })

  it('refuses to add an item without a readable price', async () => {
    const page = '<button name="submit.addToCart">Add to cart</button>'
    const { runtime, driver } = harness(TASKS.shopping, { [PRODUCT]: page }, PRODUCT)
    expect(await runtime.registry.invoke('shop_add_to_cart')).toBe('BLOCKED(price unknown)')
    expect(driver.clicks).toEqual([])
  })

  it('asks for a human when the add button never appears', async () => {
    const page = '<div id="corePriceDisplay_desktop_feature_div"><span class="a-offscreen">$5.00</span></div>'
    const { runtime } = harness(TASKS.shopping, { [PRODUCT]: page }, PRODUCT)
    expect(await runtime.registry.invoke('shop_add_to_cart')).toBe('ADD_FAILED_NEEDS_HUMAN')
  })

  it('asks for a human when checkout lands on sign-in', async () => {
    const { runtime, session } = harness(TASKS.shopping, { [PRODUCT]: product('$5.00', SIGNIN) }, PRODUCT)
    expect(await runtime.registry.invoke('shop_proceed_to_checkout')).toBe('HUMAN_NEEDED_SIGNIN')
    expect(session.isOpen).toBe(true)
  })

  it('falls back to the cart page when the overlay has no checkout button', async () => {
    const pages: Pages = {
      [PRODUCT]: '<h1>Item</h1>',
      [CART]: `<input type="submit" name="proceedToRetailCheckout" data-nav="${CHECKOUT}">`,
    }
    const { runtime, driver } = harness(TASKS.shopping, pages, PRODUCT)
    expect(await runtime.registry.invoke('shop_proceed_to_checkout')).toBe(STOPPED_ON_CHECKOUT)
    expect(driver.visited).toContain(CART)
  })

  it('pages through results until the next link is disabled', async () => {
    const page2 = 'https://www.amazon.com/s?k=usb+cable&page=2'
    const pages: Pages = {
      [SEARCH]: `${RESULTS}<a class="s-pagination-next" data-nav="${page2}">Next</a>`,
      [page2]: `${RESULTS}<a class="s-pagination-next s-pagination-disabled">Next</a>`,
    }
    const { runtime, driver } = harness(TASKS.shopping, pages, SEARCH)
    expect(await runtime.registry.invoke('shop_next_results_page')).toBe('NEXT_OK')
    expect(driver.url()).toBe(page2)
    expect(await runtime.registry.invoke('shop_next_results_page')).toBe('NO_NEXT')
  })

  it('does not stop away from checkout', async () => {
    const { runtime } = harness(TASKS.shopping, {}, CART)
    expect(await runtime.registry.invoke('shop_stop_if_checkout')).toBe('NOT_AT_CHECKOUT_SPC')
  })
})
