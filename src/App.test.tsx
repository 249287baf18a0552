import { fireEvent, render, screen, within } from '@testing-library/react'
import { describe, expect, it } from 'vitest'

import { App } from './App'

describe('App', () => {
  describe('overview', () => {
    it('shows annual bag demand and the Year 1 table', () => {
      render(<App />)

      expect(screen.getByText('60,000')).toBeInTheDocument()
      expect(screen.getByText('3,239,100')).toBeInTheDocument()
    })

    it('recomputes when an input changes', () => {
      render(<App />)

      fireEvent.change(screen.getByLabelText('Active delivery bikes'), { target: { value: '50000' } })

      expect(screen.getByText('75,000')).toBeInTheDocument()
      expect(screen.queryByRole('alert')).not.toBeInTheDocument()
    })

    it('rejects negative input and keeps the previous figures', () => {
      render(<App />)

      fireEvent.change(screen.getByLabelText('Active delivery bikes'), { target: { value: '-5' } })

      expect(screen.getByRole('alert')).toHaveTextContent('Invalid input: assumptions.market.active_bikes: must be >= 0')
      expect(screen.getByText('60,000')).toBeInTheDocument()
    })
  })

  describe('tabs', () => {
    it('shows the pilot P&L at pilot pricing', () => {
      render(<App />)

      fireEvent.click(screen.getByRole('button', { name: 'P&L' }))

      expect(screen.getByText('259,400')).toBeInTheDocument()
      expect(screen.getByText('-521,600')).toBeInTheDocument()
      expect(screen.getByText('Gross profit / unit (AED)').nextElementSibling).toHaveTextContent('197')
    })

    it('summarises the financial assumptions', () => {
      render(<App />)

      fireEvent.click(screen.getByRole('button', { name: 'Assumptions' }))

      const rows = within(screen.getByRole('table', { name: 'Financial assumptions summary' })).getAllByRole('row')
      expect(rows.map(r => r.lastElementChild?.textContent)).toEqual([
        '399', '450', '200', '499', '599', '305', '5%', '10%', '20%', '640,000',
      ])
      expect(rows[9]?.firstElementChild).toHaveTextContent('Total fixed costs (AED/year)')
    })

    it('shows breakeven units for the Base scenario', () => {
      render(<App />)

      fireEvent.click(screen.getByRole('button', { name: 'Breakeven' }))

      expect(screen.getByText('2,503')).toBeInTheDocument()
      expect(screen.getByText('2,177')).toBeInTheDocument()
    })

    it('reports unreachable breakeven', () => {
      render(<App />)

      fireEvent.click(screen.getByRole('button', { name: 'Breakeven' }))
      fireEvent.change(screen.getByLabelText(/^B2B COGS/), { target: { value: '600' } })

      expect(screen.getByText('Breakeven not achievable at these assumptions.')).toBeInTheDocument()
      expect(screen.getByText('∞')).toBeInTheDocument()
      expect(screen.getByText('N/A')).toBeInTheDocument()
    })

    it('lists sensitivity rows in rate order', () => {
      render(<App />)

      fireEvent.click(screen.getByRole('button', { name: 'Sensitivity' }))

      const rows = screen.getAllByRole('row').slice(1)
      expect(rows.map(r => r.firstElementChild?.textContent)).toEqual(['15%', '25%', '40%'])
      expect(screen.getByText('24,000')).toBeInTheDocument()
    })
  })
})
