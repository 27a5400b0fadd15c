// @vitest-environment jsdom
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import { afterEach, describe, expect, it, vi } from 'vitest';
import StationForm from './StationForm';

describe('StationForm', () => {
  afterEach(() => {
    cleanup();
  });

  it('submits the normalized station id', () => {
    const onSubmit = vi.fn();
    render(<StationForm isLoading={false} onSubmit={onSubmit} />);

    fireEvent.change(screen.getByLabelText('Airport code'), { target: { value: ' khio ' } });
    fireEvent.click(screen.getByText('Get METAR'));

    expect(onSubmit).toHaveBeenCalledWith('KHIO');
    expect(screen.queryByRole('alert')).toBeNull();
  });

  it('shows the validation message instead of submitting', () => {
    const onSubmit = vi.fn();
    render(<StationForm initialStation="HIO" isLoading={false} onSubmit={onSubmit} />);

    fireEvent.click(screen.getByText('Get METAR'));

    expect(onSubmit).not.toHaveBeenCalled();
    expect(screen.getByRole('alert').textContent).toBe('Airport code must be 4 characters (e.g., KHIO)');
  });
});
