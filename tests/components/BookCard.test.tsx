/**
 * @jest-environment jsdom
 */
import React from 'react';
import { fireEvent, render, screen, waitFor } from '@testing-library/react';
import { BookCard } from '../../components/BookCard';
import { makeBook } from '../helpers/fakes';

describe('BookCard', () => {
  it('shows the summary, metadata, loan numbers and platform links', () => {
    render(<BookCard book={makeBook()} onFeedback={jest.fn()} />);

    expect(screen.getByRole('heading', { name: 'The Quiet River' })).toBeTruthy();
    expect(screen.getByText('A short summary.')).toBeTruthy();
    expect(screen.getByText('Characters: Mira, Jun')).toBeTruthy();
    expect(screen.getByText('Rank #3 / 120 loans')).toBeTruthy();
    const link = screen.getByRole('link', { name: 'books.test' });
    expect(link.getAttribute('href')).toBe('https://books.test/item/1');
  });

  it('submits feedback for the chosen category and clears the form', async () => {
    const onFeedback = jest.fn().mockResolvedValue(undefined);
    render(<BookCard book={makeBook()} onFeedback={onFeedback} />);

    fireEvent.change(screen.getByLabelText('Feedback category'), { target: { value: 'adaptation' } });
    fireEvent.change(screen.getByLabelText('Your feedback'), { target: { value: 'The film is missing' } });
    fireEvent.click(screen.getByText('Submit feedback'));

    await waitFor(() => expect(screen.getByText('Feedback saved.')).toBeTruthy());
    expect(onFeedback).toHaveBeenCalledWith('The Quiet River', 'adaptation', 'The film is missing');
    expect((screen.getByLabelText('Your feedback') as HTMLTextAreaElement).value).toBe('');
  });

  it('reports a failed submission', async () => {
    const consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const onFeedback = jest.fn().mockRejectedValue(new Error('offline'));
    render(<BookCard book={makeBook()} onFeedback={onFeedback} />);

    fireEvent.click(screen.getByText('Submit feedback'));

    await waitFor(() => expect(screen.getByText('Could not save feedback.')).toBeTruthy());
    consoleError.mockRestore();
  });
});
