import { debounce } from "./algorithms";

describe("debounce", () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it("should collapse a burst of change events into one call with the last path", () => {
    const onChange = jest.fn();
    const debounced = debounce((changedPath: string) => onChange(changedPath), 100);

    debounced("a.css");
    debounced("b.css");
    debounced("c.css");

    expect(onChange).not.toHaveBeenCalled();

    jest.advanceTimersByTime(100);

    expect(onChange).toHaveBeenCalledTimes(1);
    expect(onChange).toHaveBeenCalledWith("c.css");
  });

  it("should restart the wait on every call", () => {
    const onChange = jest.fn();
    const debounced = debounce((changedPath: string) => onChange(changedPath), 100);

    debounced("first.js");
    jest.advanceTimersByTime(60);
    debounced("second.js");
    jest.advanceTimersByTime(60);

    expect(onChange).not.toHaveBeenCalled();

    jest.advanceTimersByTime(40);

    expect(onChange).toHaveBeenCalledTimes(1);
    expect(onChange).toHaveBeenCalledWith("second.js");
  });

  it("should fire again for a later burst", () => {
    const onChange = jest.fn();
    const debounced = debounce((changedPath: string) => onChange(changedPath), 50);

    debounced("one.js");
    jest.advanceTimersByTime(50);
    debounced("two.js");
    jest.advanceTimersByTime(50);

    expect(onChange).toHaveBeenCalledTimes(2);
    expect(onChange).toHaveBeenNthCalledWith(1, "one.js");
    expect(onChange).toHaveBeenNthCalledWith(2, "two.js");
  });
});
