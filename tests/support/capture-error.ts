export const captureError = (work: () => unknown): unknown => {
    try {
        work();
    } catch (error) {
        return error;
    }
    throw new Error('Expected the call to throw');
};

export const captureRejection = async (work: () => Promise<unknown>): Promise<unknown> => {
    try {
        await work();
    } catch (error) {
        return error;
    }
    throw new Error('Expected the promise to reject');
};
