/**
 * Test Setup — @navdock/ui
 *
 * Runs before every test file and registers the jest-dom matchers
 * (toBeInTheDocument, toHaveAttribute, toHaveFocus, etc.).
 */

import "@testing-library/jest-dom/vitest";
